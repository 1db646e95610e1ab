import { z } from 'zod';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

export const faresSchema = z.record(z.string(), z.number().int().positive());

export const datesSchema = z.record(z.string(), z.array(isoDate));

export const returnServiceSchema = z.object({
  date: z.string(),
  description: z.string(),
});

export const luggageSchema = z.object({
  maxBags: z.number().int().nonnegative(),
  bagSize: z.string(),
  handCarry: z.boolean(),
  note: z.string(),
});

export const locationsSchema = z.object({
  status: z.string(),
  note: z.string(),
  points: z.array(z.object({ point: z.string(), detail: z.string() })),
});

export const faqRowSchema = z.object({
  question: z.string(),
  answer: z.string(),
  keywords: z.array(z.string()).default([]),
});

export const SETTING_SCHEMAS = {
  fares: faresSchema,
  dates: datesSchema,
  return_service: returnServiceSchema,
  luggage: luggageSchema,
  locations: locationsSchema,
} as const;

export type SettingKey = keyof typeof SETTING_SCHEMAS;

export const SETTING_KEYS: readonly SettingKey[] = ['fares', 'dates', 'return_service', 'luggage', 'locations'];

export type Fares = z.infer<typeof faresSchema>;
export type LuggagePolicy = z.infer<typeof luggageSchema>;
export type Locations = z.infer<typeof locationsSchema>;
export type FaqRow = z.infer<typeof faqRowSchema>;

export const businessSettingsSchema = z.object(SETTING_SCHEMAS);

export type BusinessSettings = z.infer<typeof businessSettingsSchema>;

/**
 * One audited write. Values are kept as JSON text so the ring can hold any key.
 */
export interface AuditEntry {
  timestamp: string;
  adminId: string;
  settingKey: SettingKey | 'faq';
  oldValue: string;
  newValue: string;
}

export const auditEntrySchema = z.object({
  timestamp: z.string(),
  adminId: z.string(),
  settingKey: z.enum(['fares', 'dates', 'return_service', 'luggage', 'locations', 'faq']),
  oldValue: z.string(),
  newValue: z.string(),
});

export const AUDIT_LOG_LIMIT = 10;

export const DEFAULT_SETTINGS: BusinessSettings = {
  fares: { multan: 3500, bahawalpur: 4200 },
  // Departures are scheduled by admins (`date add <route> <YYYY-MM-DD>`)
  dates: {},
  return_service: {
    date: 'TBD',
    description: 'To be announced',
  },
  luggage: {
    maxBags: 2,
    bagSize: 'medium',
    handCarry: true,
    note: 'No extra charges, but large amounts of luggage may need to share your seat space.',
  },
  locations: {
    status: 'TBD',
    note: 'Exact bus locations will be shared closer to the travel date.',
    points: [],
  },
};

function parserFor<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): (value: unknown) => T | null {
  return (value) => {
    const result = schema.safeParse(value);
    return result.success ? result.data : null;
  };
}

const SETTING_PARSERS: { [K in SettingKey]: (value: unknown) => BusinessSettings[K] | null } = {
  fares: parserFor(faresSchema),
  dates: parserFor(datesSchema),
  return_service: parserFor(returnServiceSchema),
  luggage: parserFor(luggageSchema),
  locations: parserFor(locationsSchema),
};

/**
 * Parses a stored value for a key. Returns null when it does not fit the schema.
 */
export function parseSetting<K extends SettingKey>(key: K, value: unknown): BusinessSettings[K] | null {
  const parse: (value: unknown) => BusinessSettings[K] | null = SETTING_PARSERS[key];
  return parse(value);
}
