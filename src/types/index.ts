/**
 * Shared types for the translation sync pipeline.
 */

/**
 * A single string to translate or review.
 */
export interface TranslationItem {
	resourceName: string;
	/** Unique within a resource; not enforced here. */
	key: string;
	source: string;
	translation?: string;
	context: string;
}

export interface ReviewResult {
	readonly resourceName: string;
	readonly key: string;
	readonly source: string;
	readonly translation: string;
	readonly context: string;
	readonly isValid: boolean;
	readonly explanation: string;
}

/**
 * Outcome of one coordinator run. `all` is in completion order; `approved` and
 * `rejected` are in the order results reached each queue.
 */
export interface ReviewBatch {
	approved: ReviewResult[];
	rejected: ReviewResult[];
	all: ReviewResult[];
}

export type StringMode = "untranslated" | "unreviewed";

export type FetchMode = StringMode | "all";

/**
 * A string as stored in the CSV cache or returned by the platform API.
 */
export interface StringRecord {
	key: string;
	source: string;
	translation?: string;
	context: string;
}

/**
 * language -> resource name -> strings
 */
export type StringsByLanguage = Map<string, Map<string, StringRecord[]>>;

export type TranslationAction = "translate" | "review";

/**
 * An entry of `translations/<lang>.json`.
 */
export interface TranslationRecord {
	key: string;
	source: string;
	translation: string;
	context: string;
	action: TranslationAction;
	approved?: boolean;
}

/**
 * resource name -> records
 */
export type TranslationFile = Record<string, TranslationRecord[]>;
