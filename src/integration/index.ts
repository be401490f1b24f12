/**
 * Result Integration Stage
 *
 * Unifies the per-page extraction records into one dataset. The merge itself
 * is delegated to a Reconciler:
 * - RuleBasedReconciler: canonical snake_case field names, deduplication by
 *   effective key, conflict retention
 * - LLMReconciler: asks the LLM which field names are synonyms, then applies
 *   the rule-based merge with those aliases
 */

import { z } from 'zod';
import type {
  ExtractionRecord,
  FieldMap,
  FieldValue,
  IntegratedDataset,
  IntegrationSummary,
  ModuleResult,
  TaskId,
} from '../types/index.js';
import type { LLMService } from '../llm/index.js';
import { buildPrompt } from '../prompts/index.js';
import { defaultLogger, defaultMetrics, type Logger, type Metrics } from '../observability/index.js';
import { errorMessage, fail, resultMetadata, succeed, withTimeout } from '../utils/index.js';

// ============================================================================
// Field Names and Values
// ============================================================================

/**
 * Key of the object that holds irreconcilable values
 */
export const CONFLICT_MARKER = '$conflict';

/**
 * Fields tried in order when no key fields are configured
 */
export const DEFAULT_KEY_FIELDS = ['id', 'url', 'link', 'sku', 'title', 'name'];

/**
 * Convert a field name to snake_case: `postTitle`, `Post Title` and
 * `post-title` all become `post_title`.
 */
export function canonicalFieldName(name: string): string {
  const snake = name
    .trim()
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return snake || 'field';
}

export function isPopulated(value: FieldValue | undefined): boolean {
  if (value === undefined || value === null) {
    return false;
  }
  if (typeof value === 'string') {
    return value.trim().length > 0;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (typeof value === 'object') {
    return Object.keys(value).length > 0;
  }
  return true;
}

function populatedCount(row: FieldMap): number {
  return Object.values(row).filter((value) => isPopulated(value)).length;
}

/**
 * Comparison form of a value: strings trimmed, whitespace collapsed and
 * lower-cased, applied recursively
 */
export function normalizeValue(value: FieldValue): string {
  if (typeof value === 'string') {
    return JSON.stringify(value.trim().replace(/\s+/g, ' ').toLowerCase());
  }
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(normalizeValue).join(',')}]`;
  }
  const entries = Object.keys(value)
    .sort()
    .map((key) => `${JSON.stringify(key)}:${normalizeValue(value[key] ?? null)}`);
  return `{${entries.join(',')}}`;
}

function sameValue(a: FieldValue, b: FieldValue): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/**
 * Values held under the conflict marker, or null for an ordinary value
 */
export function conflictValues(value: FieldValue | undefined): FieldValue[] | null {
  if (value === null || value === undefined || typeof value !== 'object' || Array.isArray(value)) {
    return null;
  }
  const keys = Object.keys(value);
  const held = value[CONFLICT_MARKER];
  if (keys.length === 1 && Array.isArray(held)) {
    return held;
  }
  return null;
}

// ============================================================================
// Reconciler Contract
// ============================================================================

export interface ReconcileContext {
  taskId: TaskId;
  requirements: string;
  signal?: AbortSignal;
}

export interface ReconcileResult {
  records: FieldMap[];
  fieldNames: string[];
  summary: IntegrationSummary;
}

/**
 * Merges extraction records into unified rows. Throws when it cannot.
 */
export interface Reconciler {
  readonly name: string;
  reconcile(records: ExtractionRecord[], context: ReconcileContext): Promise<ReconcileResult>;
}

export interface RuleBasedReconcilerOptions {
  /** Fields whose values identify a row; overrides DEFAULT_KEY_FIELDS */
  keyFields?: string[];
  /** Field name → canonical name */
  aliases?: Record<string, string>;
}

// ============================================================================
// Rule-Based Reconciler
// ============================================================================

interface MergeState {
  row: FieldMap;
  conflictsResolved: number;
  conflictsRetained: number;
}

export class RuleBasedReconciler implements Reconciler {
  readonly name: string = 'rule_based';

  private readonly keyFields: string[];
  private readonly aliases: Map<string, string>;

  constructor(options: RuleBasedReconcilerOptions = {}) {
    this.keyFields = (options.keyFields ?? []).map(canonicalFieldName);
    this.aliases = new Map(
      Object.entries(options.aliases ?? {}).map(([from, to]) => [canonicalFieldName(from), canonicalFieldName(to)])
    );
  }

  async reconcile(records: ExtractionRecord[]): Promise<ReconcileResult> {
    return this.merge(records);
  }

  fieldName(name: string): string {
    const canonical = canonicalFieldName(name);
    return this.aliases.get(canonical) ?? canonical;
  }

  /**
   * Flatten records into rows with canonical field names. Within one row
   * the first populated value of a field wins.
   */
  toRows(records: ExtractionRecord[]): FieldMap[] {
    const rows: FieldMap[] = [];
    for (const record of records) {
      const sources = record.entities.length > 0 ? record.entities : [record.extractedFields];
      for (const source of sources) {
        const row: FieldMap = {};
        for (const [name, value] of Object.entries(source)) {
          const field = this.fieldName(name);
          if (!(field in row) || (!isPopulated(row[field]) && isPopulated(value))) {
            row[field] = value;
          }
        }
        if (Object.keys(row).length > 0) {
          rows.push(row);
        }
      }
    }
    return rows;
  }

  effectiveKey(row: FieldMap): string {
    if (this.keyFields.length > 0 && this.keyFields.some((field) => isPopulated(row[field]))) {
      return `keys:${this.keyFields.map((field) => normalizeValue(row[field] ?? null)).join('|')}`;
    }
    for (const field of DEFAULT_KEY_FIELDS) {
      const value = row[field];
      if (value !== undefined && isPopulated(value)) {
        return `${field}:${normalizeValue(value)}`;
      }
    }
    const content = Object.keys(row)
      .filter((field) => isPopulated(row[field]))
      .sort()
      .map((field) => `${field}=${normalizeValue(row[field] ?? null)}`);
    return `content:${content.join('|')}`;
  }

  merge(records: ExtractionRecord[]): ReconcileResult {
    const rows = this.toRows(records);
    const byKey = new Map<string, MergeState>();
    const order: MergeState[] = [];
    let duplicatesRemoved = 0;

    for (const row of rows) {
      const key = this.effectiveKey(row);
      const existing = byKey.get(key);
      if (!existing) {
        const state: MergeState = { row: { ...row }, conflictsResolved: 0, conflictsRetained: 0 };
        byKey.set(key, state);
        order.push(state);
        continue;
      }
      duplicatesRemoved++;
      mergeInto(existing, row);
    }

    const merged = order.map((state) => state.row);
    const fieldNames: string[] = [];
    for (const row of merged) {
      for (const field of Object.keys(row)) {
        if (!fieldNames.includes(field)) {
          fieldNames.push(field);
        }
      }
    }

    return {
      records: merged,
      fieldNames,
      summary: {
        totalRecords: merged.length,
        duplicatesRemoved,
        conflictsResolved: order.reduce((sum, state) => sum + state.conflictsResolved, 0),
        conflictsRetained: order.reduce((sum, state) => sum + state.conflictsRetained, 0),
      },
    };
  }
}

/**
 * Merge a later duplicate into the first-seen row, in place. A later row
 * with strictly more populated fields supersedes the first-seen values,
 * disagreeing ones included; with no such row, disagreeing values are kept
 * under the conflict marker. The first-seen row keeps its position and key
 * order.
 */
function mergeInto(state: MergeState, incoming: FieldMap): void {
  const current = state.row;
  const incomingWins = populatedCount(incoming) > populatedCount(current);
  const fields = [...Object.keys(current), ...Object.keys(incoming).filter((field) => !(field in current))];
  const next: FieldMap = {};

  for (const field of fields) {
    const kept = current[field];
    const offered = incoming[field];

    if (kept === undefined || !isPopulated(kept)) {
      next[field] = offered !== undefined && isPopulated(offered) ? offered : kept ?? offered ?? null;
      continue;
    }
    if (offered === undefined || !isPopulated(offered)) {
      next[field] = kept;
      continue;
    }

    const held = conflictValues(kept);
    if (incomingWins && !sameValue(kept, offered)) {
      state.conflictsResolved++;
      next[field] = offered;
      continue;
    }
    if (held) {
      if (held.some((value) => sameValue(value, offered))) {
        next[field] = kept;
      } else if (held.some((value) => normalizeValue(value) === normalizeValue(offered))) {
        state.conflictsResolved++;
        next[field] = kept;
      } else {
        state.conflictsRetained++;
        next[field] = { [CONFLICT_MARKER]: [...held, offered] };
      }
      continue;
    }

    if (sameValue(kept, offered)) {
      next[field] = kept;
    } else if (normalizeValue(kept) === normalizeValue(offered)) {
      state.conflictsResolved++;
      next[field] = kept;
    } else {
      state.conflictsRetained++;
      next[field] = { [CONFLICT_MARKER]: [kept, offered] };
    }
  }

  state.row = next;
}

// ============================================================================
// LLM-Assisted Reconciler
// ============================================================================

export const AliasResponseSchema = z.object({
  aliases: z.record(z.string()).default({}),
});

export const INTEGRATION_SCHEMA_HINT = `{
  "aliases": { "<observed_field_name>": "<canonical_field_name>" }
}`;

const SAMPLE_ROWS = 20;
const DEFAULT_LLM_TIMEOUT_MS = 120000;

export interface LLMReconcilerOptions extends RuleBasedReconcilerOptions {
  llmTimeoutMs?: number;
  promptsDir?: string;
  logger?: Logger;
}

export class LLMReconciler implements Reconciler {
  readonly name = 'llm';

  private readonly logger: Logger;

  constructor(
    private readonly llm: LLMService,
    private readonly options: LLMReconcilerOptions = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
  }

  async reconcile(records: ExtractionRecord[], context: ReconcileContext): Promise<ReconcileResult> {
    const base = new RuleBasedReconciler(this.options);
    const rows = base.toRows(records);
    const observed = Array.from(new Set(rows.flatMap((row) => Object.keys(row))));

    if (observed.length < 2) {
      return base.merge(records);
    }

    const instructions = await buildPrompt(
      'integration',
      {
        requirements: context.requirements,
        field_names: observed.join(', '),
        schema_hint: INTEGRATION_SCHEMA_HINT,
      },
      this.options.promptsDir
    );

    const content = JSON.stringify(rows.slice(0, SAMPLE_ROWS), null, 2);
    const result = await withTimeout(
      (callSignal) =>
        this.llm.run({
          taskId: context.taskId,
          instructions,
          content,
          schema: AliasResponseSchema,
          schemaHint: INTEGRATION_SCHEMA_HINT,
          signal: callSignal,
        }),
      this.options.llmTimeoutMs ?? DEFAULT_LLM_TIMEOUT_MS,
      'Field alias resolution',
      context.signal
    );
    if (!result.success) {
      throw new Error(`Field alias resolution failed: ${result.error.message}`);
    }

    const aliases = { ...result.data.aliases, ...this.options.aliases };
    this.logger.debug('Field aliases resolved', { taskId: context.taskId, aliases });

    return new RuleBasedReconciler({ ...this.options, aliases }).merge(records);
  }
}

// ============================================================================
// Stage
// ============================================================================

export interface IntegrationInput {
  taskId: TaskId;
  requirements: string;
  mainPageRecord: ExtractionRecord | null;
  subPageRecords: ExtractionRecord[];
  /** Per-page failures reported by extraction */
  issues: string[];
  pagesProcessed: number;
  pagesFailed: number;
  signal?: AbortSignal;
}

export interface IntegrationStageOptions {
  logger?: Logger;
  metrics?: Metrics;
}

export class ResultIntegrationStage {
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(
    private readonly reconciler: Reconciler,
    options: IntegrationStageOptions = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  async run(input: IntegrationInput): Promise<ModuleResult<IntegratedDataset>> {
    const startTime = Date.now();
    const { taskId } = input;
    const records = input.mainPageRecord ? [input.mainPageRecord, ...input.subPageRecords] : input.subPageRecords;

    this.logger.info('Starting result integration', {
      taskId,
      records: records.length,
      reconciler: this.reconciler.name,
    });

    let reconciled: ReconcileResult;
    try {
      const context: ReconcileContext = { taskId, requirements: input.requirements };
      if (input.signal) {
        context.signal = input.signal;
      }
      reconciled = await this.reconciler.reconcile(records, context);
    } catch (error) {
      this.logger.error('Result integration failed', { taskId, error: errorMessage(error) });
      this.metrics.increment('integration.failed');
      return fail(
        'INTEGRATION_FAILED',
        `Reconciliation failed: ${errorMessage(error)}`,
        resultMetadata(taskId, 'result_integration', startTime)
      );
    }

    const issues = [
      ...input.issues,
      ...records.flatMap((record) => record.issues.map((issue) => `${record.sourceUrl}: ${issue}`)),
    ];

    const dataset: IntegratedDataset = {
      records: reconciled.records,
      summary: reconciled.summary,
      metadata: {
        fieldNames: reconciled.fieldNames,
        sourcePages: records.map((record) => record.sourceUrl),
        pagesProcessed: input.pagesProcessed,
        pagesFailed: input.pagesFailed,
        issues,
        reconciler: this.reconciler.name,
      },
    };

    this.logger.info('Result integration complete', { taskId, ...reconciled.summary });
    this.metrics.timing('integration.duration', Date.now() - startTime);
    this.metrics.gauge('integration.records', reconciled.summary.totalRecords);

    return succeed(dataset, resultMetadata(taskId, 'result_integration', startTime));
  }
}
