import type Redis from 'ioredis';
import logger from '../config/logger';
import {
  AUDIT_LOG_LIMIT,
  AuditEntry,
  BusinessSettings,
  DEFAULT_SETTINGS,
  FaqRow,
  SETTING_KEYS,
  SettingKey,
  auditEntrySchema,
  faqRowSchema,
  parseSetting,
} from '../types/settings';
import { KeyedMutex } from '../utils/keyedMutex';
import { errorMessage } from '../utils/AppError';

const SETTINGS_HASH = 'settings';
const FAQ_FIELD = 'faq';
const AUDIT_LIST = 'audit_log';

export interface SettingsStore {
  /** Seeds defaults for any missing key */
  init(): Promise<void>;
  get<K extends SettingKey>(key: K): Promise<BusinessSettings[K]>;
  getAll(): Promise<BusinessSettings>;
  /** Writes the value and appends one audit entry in the same step */
  put<K extends SettingKey>(key: K, value: BusinessSettings[K], adminId: string): Promise<AuditEntry>;
  listAudit(): Promise<AuditEntry[]>;
  listFaq(): Promise<FaqRow[]>;
  addFaq(row: FaqRow, adminId: string): Promise<AuditEntry>;
  /** Removes the row at a zero-based position; null when there is none */
  removeFaq(index: number, adminId: string): Promise<FaqRow | null>;
}

/**
 * Shared settings logic. Subclasses supply raw field storage and an atomic
 * "write field + push audit + trim ring" primitive.
 */
abstract class BaseSettingsStore implements SettingsStore {
  // Last-write-wins across admins; in-process writers still queue so a
  // read-modify-write of the FAQ list cannot interleave
  private readonly writes = new KeyedMutex();

  /** Values in `seed` replace the defaults written by `init` */
  constructor(private readonly seed: Partial<BusinessSettings> = {}) {}

  protected abstract readField(field: string): Promise<string | null>;
  protected abstract writeFieldIfMissing(field: string, json: string): Promise<void>;
  protected abstract commit(field: string, json: string, audit: AuditEntry): Promise<void>;
  protected abstract readAuditLog(): Promise<string[]>;

  async init(): Promise<void> {
    for (const key of SETTING_KEYS) {
      await this.writeFieldIfMissing(key, JSON.stringify(this.seed[key] ?? DEFAULT_SETTINGS[key]));
    }
    await this.writeFieldIfMissing(FAQ_FIELD, '[]');
  }

  async get<K extends SettingKey>(key: K): Promise<BusinessSettings[K]> {
    const raw = await this.readField(key);
    if (raw === null) {
      return structuredClone(DEFAULT_SETTINGS[key]);
    }

    const parsed = parseSetting(key, safeJson(raw));
    if (parsed === null) {
      logger.warn('Stored setting is invalid, using default:', { key });
      return structuredClone(DEFAULT_SETTINGS[key]);
    }
    return parsed;
  }

  async getAll(): Promise<BusinessSettings> {
    return {
      fares: await this.get('fares'),
      dates: await this.get('dates'),
      return_service: await this.get('return_service'),
      luggage: await this.get('luggage'),
      locations: await this.get('locations'),
    };
  }

  async put<K extends SettingKey>(key: K, value: BusinessSettings[K], adminId: string): Promise<AuditEntry> {
    return this.writes.runExclusive(key, async () => {
      const oldValue = await this.get(key);
      const audit = buildAudit(adminId, key, oldValue, value);
      await this.commit(key, JSON.stringify(value), audit);
      logger.info('Setting updated:', { key, adminId });
      return audit;
    });
  }

  async listAudit(): Promise<AuditEntry[]> {
    const raw = await this.readAuditLog();
    const entries: AuditEntry[] = [];
    for (const item of raw) {
      const parsed = auditEntrySchema.safeParse(safeJson(item));
      if (parsed.success) {
        entries.push(parsed.data);
      }
    }
    return entries.slice(0, AUDIT_LOG_LIMIT);
  }

  async listFaq(): Promise<FaqRow[]> {
    const raw = await this.readField(FAQ_FIELD);
    const json = raw === null ? [] : safeJson(raw);
    const parsed = faqRowSchema.array().safeParse(json);
    if (!parsed.success) {
      logger.warn('Stored FAQ rows are invalid, ignoring them');
      return [];
    }
    return parsed.data;
  }

  async addFaq(row: FaqRow, adminId: string): Promise<AuditEntry> {
    return this.writes.runExclusive(FAQ_FIELD, async () => {
      const rows = await this.listFaq();
      const next = [...rows, row];
      const audit = buildAudit(adminId, 'faq', null, row);
      await this.commit(FAQ_FIELD, JSON.stringify(next), audit);
      return audit;
    });
  }

  async removeFaq(index: number, adminId: string): Promise<FaqRow | null> {
    return this.writes.runExclusive(FAQ_FIELD, async () => {
      const rows = await this.listFaq();
      const removed = rows[index];
      if (index < 0 || removed === undefined) {
        return null;
      }
      const next = rows.filter((_, position) => position !== index);
      await this.commit(FAQ_FIELD, JSON.stringify(next), buildAudit(adminId, 'faq', removed, null));
      return removed;
    });
  }
}

function buildAudit(adminId: string, settingKey: AuditEntry['settingKey'], oldValue: unknown, newValue: unknown): AuditEntry {
  return {
    timestamp: new Date().toISOString(),
    adminId,
    settingKey,
    oldValue: JSON.stringify(oldValue),
    newValue: JSON.stringify(newValue),
  };
}

function safeJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * Settings kept in the process. Each commit is synchronous, so the audit
 * append and truncate can never interleave with another write.
 */
export class InMemorySettingsStore extends BaseSettingsStore {
  private readonly fields = new Map<string, string>();
  private auditLog: string[] = [];

  protected async readField(field: string): Promise<string | null> {
    return this.fields.get(field) ?? null;
  }

  protected async writeFieldIfMissing(field: string, json: string): Promise<void> {
    if (!this.fields.has(field)) {
      this.fields.set(field, json);
    }
  }

  protected async commit(field: string, json: string, audit: AuditEntry): Promise<void> {
    this.fields.set(field, json);
    this.auditLog = [JSON.stringify(audit), ...this.auditLog].slice(0, AUDIT_LOG_LIMIT);
  }

  protected async readAuditLog(): Promise<string[]> {
    return [...this.auditLog];
  }
}

/**
 * Settings in a Redis hash, audit ring in a Redis list (newest first).
 * The field write, LPUSH and LTRIM go out as one MULTI.
 */
export class RedisSettingsStore extends BaseSettingsStore {
  constructor(private readonly redis: Redis) {
    super();
  }

  protected async readField(field: string): Promise<string | null> {
    return this.redis.hget(SETTINGS_HASH, field);
  }

  protected async writeFieldIfMissing(field: string, json: string): Promise<void> {
    const created = await this.redis.hsetnx(SETTINGS_HASH, field, json);
    if (created === 1) {
      logger.info(`Seeded default setting: ${field}`);
    }
  }

  protected async commit(field: string, json: string, audit: AuditEntry): Promise<void> {
    const results = await this.redis
      .multi()
      .hset(SETTINGS_HASH, field, json)
      .lpush(AUDIT_LIST, JSON.stringify(audit))
      .ltrim(AUDIT_LIST, 0, AUDIT_LOG_LIMIT - 1)
      .exec();

    const failed = results?.find(([error]) => error !== null);
    if (results === null || failed) {
      const reason = failed ? errorMessage(failed[0]) : 'transaction aborted';
      throw new Error(`Settings write for ${field} failed: ${reason}`);
    }
  }

  protected async readAuditLog(): Promise<string[]> {
    return this.redis.lrange(AUDIT_LIST, 0, AUDIT_LOG_LIMIT - 1);
  }
}
