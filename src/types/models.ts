/**
 * Type definitions and Zod schemas for type-safe data validation.
 */

import { z } from 'zod';
import type { JsonObject } from './utils.js';

// ============================================================================
// IDENTITY
// ============================================================================

/**
 * Caller identity as supplied by the upstream auth layer.
 * Table permissions are derived from `role` only, never from `userId`.
 */
export interface Identity {
	readonly userId: string;
	readonly role: string;
}

/**
 * Identity headers set by the authenticating proxy in front of the API.
 */
export const IdentityHeadersSchema = z.object({
	'x-user-id': z.string().trim().min(1).max(128),
	'x-user-role': z.string().trim().min(1).max(64),
});

// ============================================================================
// REJECTION TAXONOMY
// ============================================================================

/**
 * Top-level failure kinds. `GenerationUnavailable` never reaches a caller:
 * the producer degrades to templates instead.
 */
export type RejectionKind =
	| 'ValidationRejected'
	| 'TemplateUnmatched'
	| 'ExecutionTimeout'
	| 'ExecutionFailure';

/**
 * Stable reason codes carried by every rejection.
 */
export type RejectReason =
	// request-level
	| 'EmptyQuestion'
	| 'QuestionTooLong'
	// safety validator, in check order
	| 'EmptyQuery'
	| 'MalformedStatement'
	| 'MultipleStatements'
	| 'NotReadOnly'
	| 'ForbiddenKeyword'
	| 'ForbiddenConstruct'
	| 'TableNotAllowed'
	| 'LimitExceeded'
	| 'InvalidLimit'
	// producer
	| 'TemplateUnmatched'
	// execution
	| 'ExecutionTimeout'
	| 'ExecutionFailure'
	| 'CatalogUnavailable';

/**
 * A structured, user-actionable rejection.
 */
export interface Rejection {
	readonly reason: RejectReason;
	readonly message: string;
	readonly offendingFragment?: string;
	/** Present on TableNotAllowed: exactly the caller's permitted tables, sorted. */
	readonly permittedTables?: readonly string[];
}

// ============================================================================
// CANDIDATES
// ============================================================================

/**
 * Where a candidate query came from.
 */
export type CandidateSource = 'generated' | 'template';

/**
 * An unvalidated SQL statement produced for one request.
 */
export interface Candidate {
	readonly sql: string;
	readonly source: CandidateSource;
}

// ============================================================================
// EXECUTION
// ============================================================================

/**
 * Rows returned by the bounded executor.
 */
export interface ExecutionResult {
	readonly columns: readonly string[];
	readonly rows: readonly JsonObject[];
	readonly rowCount: number;
}

// ============================================================================
// PIPELINE RESPONSES
// ============================================================================

/**
 * Successful answer to a question.
 */
export interface AnswerResponse {
	readonly status: 'ok';
	readonly sql: string;
	readonly columns: readonly string[];
	readonly rows: readonly JsonObject[];
	readonly row_count: number;
	readonly cache_hit: boolean;
	/** Absent on cache hits, where no candidate was produced. */
	readonly source?: CandidateSource;
	readonly explanation?: string;
}

/**
 * Structured rejection of a question.
 */
export interface RejectedResponse {
	readonly status: 'rejected';
	readonly kind: RejectionKind;
	readonly reject_reason: RejectReason;
	readonly message: string;
	readonly offending_fragment?: string;
	readonly permitted_tables?: readonly string[];
	/** The candidate or executed SQL, shown for transparency when one exists. */
	readonly sql?: string;
}

export type QuestionResponse = AnswerResponse | RejectedResponse;

/**
 * Result cache statistics.
 */
export interface CacheStats {
	entry_count: number;
	max_entries: number;
	ttl_seconds: number;
	hit_count: number;
	miss_count: number;
	eviction_count: number;
}

// ============================================================================
// REQUEST BODIES
// ============================================================================

/**
 * Request model for natural language questions.
 */
export interface QueryRequest {
	question: string;
}

/**
 * Querystring for the audit log endpoint.
 */
export const LogsQuerySchema = z.object({
	limit: z.coerce.number().int().min(1).max(1000).default(50),
});
