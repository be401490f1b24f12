/**
 * Core type definitions for the web extraction orchestrator
 *
 * This module exports all shared types used across the system.
 */

/**
 * Unique identifier for an extraction task (UUID v4)
 */
export type TaskId = string;

// ============================================================================
// Task Lifecycle
// ============================================================================

/**
 * Task status. `completed` and `failed` are terminal.
 */
export type TaskStatus =
  | 'pending'
  | 'discovery'
  | 'extraction'
  | 'integration'
  | 'completed'
  | 'failed';

/**
 * Agent (stage) responsible for the current status
 */
export type AgentType = 'page_discovery' | 'content_extraction' | 'result_integration';

/**
 * Stage named in a task error. `orchestrator` covers failures outside a stage.
 */
export type FailureStage = AgentType | 'orchestrator';

/**
 * Error codes carried by ModuleResult and task errors
 */
export type PipelineErrorCode =
  | 'INVALID_ARGUMENT'
  | 'NOT_FOUND'
  | 'NOT_READY'
  | 'INVALID_TRANSITION'
  | 'DISCOVERY_FAILED'
  | 'EXTRACTION_FAILED'
  | 'INTEGRATION_FAILED'
  | 'TIMEOUT'
  | 'CRAWL_ERROR'
  | 'LLM_ERROR'
  | 'LLM_PARSE_ERROR'
  | 'MISSING_API_KEY'
  | 'UNEXPECTED';

/**
 * Error recorded on a failed task
 */
export interface TaskError {
  code: PipelineErrorCode;
  stage: FailureStage;
  message: string;
}

/**
 * Unit of work tracked by the task store
 */
export interface Task {
  id: TaskId;
  userId: string;
  requirements: string;
  targetUrl: string;
  status: TaskStatus;
  progress: number;
  currentAgent: AgentType | null;
  message: string;
  result?: IntegratedDataset;
  error?: TaskError;
  createdAt: string;
  updatedAt: string;
}

/**
 * Read-only view returned by status and stream operations
 */
export interface TaskStatusView {
  taskId: TaskId;
  status: TaskStatus;
  progress: number;
  currentAgent: AgentType | null;
  message: string;
  error: TaskError | null;
  hasResult: boolean;
  createdAt: string;
  updatedAt: string;
}

// ============================================================================
// Extracted Data
// ============================================================================

/**
 * JSON-compatible value held by an extracted field
 */
export type FieldValue =
  | string
  | number
  | boolean
  | null
  | FieldValue[]
  | { [key: string]: FieldValue };

/**
 * Mapping of field name to value
 */
export type FieldMap = Record<string, FieldValue>;

/**
 * Page produced by discovery
 */
export interface DiscoveredPage {
  url: string;
  title: string;
}

/**
 * Structured data extracted from one page
 */
export interface ExtractionRecord {
  sourceUrl: string;
  title: string;
  /** Page-level fields */
  extractedFields: FieldMap;
  /** Row-level items found on the page, in page order */
  entities: FieldMap[];
  extractionMetadata: {
    durationMs: number;
    byteSize: number;
  };
  issues: string[];
}

/**
 * Summary counters for an integrated dataset
 */
export interface IntegrationSummary {
  totalRecords: number;
  duplicatesRemoved: number;
  /** Disagreements settled because the values matched after normalization */
  conflictsResolved: number;
  /** Disagreements kept under the conflict marker */
  conflictsRetained: number;
}

/**
 * Final dataset produced by the integration stage
 */
export interface IntegratedDataset {
  records: FieldMap[];
  summary: IntegrationSummary;
  metadata: {
    fieldNames: string[];
    sourcePages: string[];
    pagesProcessed: number;
    pagesFailed: number;
    issues: string[];
    reconciler: string;
  };
}

// ============================================================================
// Artifact Storage
// ============================================================================

/**
 * Artifact types persisted per task
 */
export type ArtifactType = 'discovery' | 'extraction' | 'dataset' | 'task';

/**
 * Artifact metadata for storage tracking
 */
export interface ArtifactMetadata {
  taskId: TaskId;
  artifactType: string;
  fileName: string;
  createdAt: string;
  contentType: string;
  size?: number;
  checksum?: string;
}

/**
 * Storage adapter interface for artifact persistence
 */
export interface StorageAdapter {
  save(taskId: TaskId, artifactType: string, content: string | Buffer, metadata?: Record<string, string>): Promise<ArtifactMetadata>;
  load(taskId: TaskId, artifactType: string): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }>;
  exists(taskId: TaskId, artifactType: string): Promise<boolean>;
  list(taskId: TaskId): Promise<ArtifactMetadata[]>;
  delete(taskId: TaskId, artifactType?: string): Promise<void>;
}

// ============================================================================
// Result Envelope
// ============================================================================

/**
 * Error payload of a failed ModuleResult
 */
export interface ModuleError {
  code: PipelineErrorCode;
  message: string;
  details?: unknown;
}

/**
 * Metadata attached to every ModuleResult
 */
export interface ModuleResultMetadata {
  taskId: TaskId;
  module: string;
  timestamp: string;
  duration?: number;
}

/**
 * Module result wrapper shared by every stage and API operation
 */
export type ModuleResult<T = unknown> =
  | { success: true; data: T; metadata: ModuleResultMetadata }
  | { success: false; error: ModuleError; metadata: ModuleResultMetadata };
