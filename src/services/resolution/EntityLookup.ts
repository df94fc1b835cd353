import { CREATION_FIELD_CANDIDATES } from '../../config/resolution.js';
import { ENVIRONMENT } from '../../config/environment.js';
import type {
  DataRecord,
  EntityId,
  EntityRecord,
  JsonValue,
  ResolutionConfig,
  ResolutionScope,
} from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { TextUtils } from '../../utils/text.js';
import { withTimeout } from '../../utils/timeout.js';
import type { EntityStore } from '../store/EntityStore.js';
import { ConfigurationError } from './errors.js';

/**
 * Store access shared by the single and batch resolvers: exact lookups,
 * projections and automatic creation, each bounded by the store timeout.
 */
export class EntityLookup {
  constructor(
    private readonly scope: ResolutionScope = {},
    private readonly timeoutMs: number = ENVIRONMENT.STORE_TIMEOUT_MS
  ) {}

  /**
   * Case-insensitive equality on any configured search field, within the config's filters
   */
  async exactMatch(store: EntityStore, config: ResolutionConfig, identifier: string): Promise<EntityRecord | null> {
    return withTimeout(
      store.findOne({
        filters: config.filters,
        match: { fields: config.searchFields, terms: [identifier], mode: 'equals' },
      }),
      this.timeoutMs,
      `${store.model} store`
    );
  }

  async findById(store: EntityStore, id: EntityId): Promise<EntityRecord | null> {
    return withTimeout(store.findOne({ id }), this.timeoutMs, `${store.model} store`);
  }

  /**
   * Fields for a record created without asking the user anything:
   * the identifier column, workspace and creator columns from the scope,
   * writable structured-identifier values, then the config's static defaults.
   */
  async buildCreationFields(
    store: EntityStore,
    config: ResolutionConfig,
    identifier: string,
    extra: DataRecord = {}
  ): Promise<DataRecord> {
    const writable = await withTimeout(store.listWritableFields(), this.timeoutMs, `${store.model} store`);
    const writableSet = new Set(writable);
    const firstWritable = (candidates: readonly string[]): string | undefined =>
      candidates.find((candidate) => writableSet.has(candidate));

    const identifierField = config.identifierField ?? firstWritable(CREATION_FIELD_CANDIDATES.IDENTIFIER);
    if (!identifierField) {
      throw new ConfigurationError(`Model "${config.model}" has no writable identifier field`);
    }

    const fields: DataRecord = {};
    for (const [key, value] of Object.entries(extra)) {
      if (writableSet.has(key) && value !== null) fields[key] = value;
    }
    if (TextUtils.asText(fields[identifierField]) === null) {
      fields[identifierField] = identifier;
    }

    const workspaceField = firstWritable(CREATION_FIELD_CANDIDATES.WORKSPACE);
    if (workspaceField && this.scope.workspaceId !== undefined) {
      fields[workspaceField] = this.scope.workspaceId;
    }

    const creatorField = firstWritable(CREATION_FIELD_CANDIDATES.CREATOR);
    if (creatorField && this.scope.creatorId !== undefined) {
      fields[creatorField] = this.scope.creatorId;
    }

    return { ...fields, ...config.defaults };
  }

  async createEntity(
    store: EntityStore,
    config: ResolutionConfig,
    identifier: string,
    extra: DataRecord = {}
  ): Promise<EntityRecord> {
    const fields = await this.buildCreationFields(store, config, identifier, extra);
    const record = await withTimeout(store.create(fields), this.timeoutMs, `${store.model} store`);
    logger.info(`✨ [EntityLookup] Created ${config.model}`, { id: record.id, identifier });
    return record;
  }

  /**
   * Pick the listed fields of a record; "id" maps to the record id
   */
  static project(record: EntityRecord, fields: readonly string[]): DataRecord {
    const projected: DataRecord = {};
    for (const field of fields) {
      const value: JsonValue | undefined = field === 'id' ? record.id : record.fields[field];
      if (value !== undefined) projected[field] = value;
    }
    return projected;
  }

  /**
   * Field that holds an item's identifier: configured, else "name" when searchable, else the first search field
   */
  static itemIdentifierField(config: ResolutionConfig): string {
    if (config.identifierField) return config.identifierField;
    return config.searchFields.includes('name') ? 'name' : config.searchFields[0];
  }

  /**
   * Search value for a structured identifier, honouring search-field priority
   */
  static searchValueOf(item: DataRecord, config: ResolutionConfig): string | null {
    for (const field of config.searchFields) {
      const value = TextUtils.asText(item[field]);
      if (value) return value;
    }
    if (config.identifierField) {
      const value = TextUtils.asText(item[config.identifierField]);
      if (value) return value;
    }
    return null;
  }
}
