import logger from '../config/logger';
import { BusinessSettings, DEFAULT_SETTINGS, FaqRow } from '../types/settings';
import { buildIndex, EMPTY_INDEX } from './knowledge/kb.index';
import { KnowledgeBaseIndex } from './knowledge/kb.types';
import { SettingsStore } from './settings.store';

/**
 * Settings, FAQ rows and the index built from them, swapped as one value
 */
export interface KnowledgeSnapshot {
  readonly settings: BusinessSettings;
  readonly faqRows: readonly FaqRow[];
  readonly index: KnowledgeBaseIndex;
  readonly version: number;
  readonly builtAt: Date;
}

/**
 * KnowledgeBase owns the process-wide "current settings + index" pair.
 * Readers always see a complete snapshot: rebuilds build a new one off to
 * the side and replace the reference in one assignment.
 */
export class KnowledgeBase {
  private snapshot: KnowledgeSnapshot = {
    settings: DEFAULT_SETTINGS,
    faqRows: [],
    index: EMPTY_INDEX,
    version: 0,
    builtAt: new Date(0),
  };
  private queue: Promise<unknown> = Promise.resolve();
  private initialized = false;

  constructor(
    private readonly store: SettingsStore,
    private readonly origin: string
  ) {}

  /**
   * Seeds missing settings and performs the first build
   */
  async init(): Promise<void> {
    await this.store.init();
    await this.rebuild();
    this.initialized = true;
    logger.info(`Knowledge base ready: ${this.snapshot.index.entries.length} entries`);
  }

  /**
   * Rebuilds from storage. Calls queue behind each other so a slow older
   * rebuild can never overwrite a newer one.
   */
  rebuild(): Promise<KnowledgeSnapshot> {
    const next = this.queue.then(() => this.buildSnapshot());
    this.queue = next.catch(() => undefined);
    return next;
  }

  current(): KnowledgeSnapshot {
    return this.snapshot;
  }

  get isReady(): boolean {
    return this.initialized;
  }

  teardown(): void {
    this.initialized = false;
    logger.info('Knowledge base torn down');
  }

  private async buildSnapshot(): Promise<KnowledgeSnapshot> {
    const settings = await this.store.getAll();
    const faqRows = await this.store.listFaq();
    const snapshot: KnowledgeSnapshot = {
      settings,
      faqRows,
      index: buildIndex(settings, faqRows, this.origin),
      version: this.snapshot.version + 1,
      builtAt: new Date(),
    };
    this.snapshot = snapshot;
    logger.debug(`Knowledge base rebuilt: version=${snapshot.version} entries=${snapshot.index.entries.length}`);
    return snapshot;
  }
}
