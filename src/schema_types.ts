/**
 * Schema Types for retrieval, synthesis and workflow state
 *
 * Defines types for:
 * - SchemaDocument (one indexed description of a table or of the schema)
 * - Relationships and their provenance
 * - Golden examples
 * - Collaborator capabilities (embedding, completion, query execution)
 * - WorkflowState (one record per question)
 */

// ============================================================================
// Schema Documents
// ============================================================================

export type DocumentKind = "table" | "overview"

/**
 * Column facts a table document was rendered from
 */
export interface ColumnDescriptor {
	column_name: string
	data_type: string
	/** Free-text column annotation (COMMENT ON COLUMN), if any */
	description: string | null
}

export interface DocumentMetadata {
	database: string
	schema: string
	table?: string
	kind: DocumentKind
	/** Table annotation (COMMENT ON TABLE), table documents only */
	table_comment?: string | null
	/** Full column list in ordinal order, table documents only */
	columns?: ColumnDescriptor[]
	/** Rendered join hints from the relationship map, table documents only */
	relationships?: string[]
}

export interface SchemaDocument {
	text: string
	embedding: number[]
	metadata: DocumentMetadata
}

/**
 * A document returned from the index, annotated with its squared
 * Euclidean distance to the query embedding
 */
export interface SearchHit {
	text: string
	metadata: DocumentMetadata
	distance: number
}

/**
 * A document in the context handed to the synthesizer. Table documents may
 * have been re-rendered with a pruned column list.
 */
export interface ContextDocument {
	text: string
	metadata: DocumentMetadata
	distance?: number
}

/**
 * Render a table document. Column pruning reuses this with a subset of
 * columns so the pruned text reads exactly like the indexed one.
 */
export function renderTableDocument(
	schema: string,
	table: string,
	tableComment: string | null | undefined,
	columns: ColumnDescriptor[],
	relationships: string[] = [],
): string {
	const colParts = columns.map(c =>
		c.description
			? `${c.column_name} (${c.description}, ${c.data_type})`
			: `${c.column_name} (${c.data_type})`,
	)
	const tableDesc = tableComment ? ` (${tableComment})` : ""
	const relStr = relationships.length > 0 ? `\nRelationships: ${relationships.join("; ")}` : ""
	return `Schema: ${schema}, Table: ${schema}.${table}${tableDesc}\nColumns: ${colParts.join(" | ")}${relStr}`
}

/**
 * Render the schema overview document. It carries the schema-qualification
 * instruction, so retrieval always keeps it.
 */
export function renderOverviewDocument(database: string, schema: string, tables: string[]): string {
	return (
		`Database: ${database}, Schema: ${schema}\n` +
		`Available tables: ${tables.map(t => `${schema}.${t}`).join(", ")}\n` +
		`IMPORTANT: Always use schema-qualified table names: ${schema}.tablename`
	)
}

/** Text of a single column, embedded on its own during column pruning. */
export function renderColumnText(table: string, column: ColumnDescriptor): string {
	return column.description
		? `${table}.${column.column_name}: ${column.description} (${column.data_type})`
		: `${table}.${column.column_name} (${column.data_type})`
}

// ============================================================================
// Relationships
// ============================================================================

/**
 * Provenance of a join edge. Listed lowest priority first: when the same
 * edge comes from several sources the later one wins.
 */
export const RELATIONSHIP_ORIGINS = ["fk_constraint", "comment_fk", "yaml"] as const

export type RelationshipOrigin = (typeof RELATIONSHIP_ORIGINS)[number]

export interface Relationship {
	source_table: string
	source_column: string
	target_table: string
	target_column: string
	origin: RelationshipOrigin
	description?: string
}

// ============================================================================
// Golden Examples
// ============================================================================

export interface GoldenExample {
	question: string
	sql: string
}

export interface RankedExample extends GoldenExample {
	distance: number
}

// ============================================================================
// Collaborators
// ============================================================================

export interface EmbeddingProvider {
	embed(text: string): Promise<number[]>
}

export interface CompletionOptions {
	temperature?: number
	maxTokens?: number
}

export interface CompletionProvider {
	complete(prompt: string, options?: CompletionOptions): Promise<string>
}

export type ResultValue = string | number | boolean | null | Date | bigint | object

export type ResultRow = ResultValue[]

export interface QueryResultSet {
	rows: ResultRow[]
	columnNames: string[]
}

export type RunQueryWithColumns = (sql: string) => Promise<QueryResultSet>

export interface QueryRunner {
	runQuery(sql: string, params?: unknown[]): Promise<ResultRow[]>
	runQueryWithColumns: RunQueryWithColumns
	close?(): Promise<void>
}

/** Per-table set of every column name known to exist. */
export type ColumnWhitelist = Map<string, Set<string>>

// ============================================================================
// Workflow State
// ============================================================================

export type WorkflowStage =
	| "retrieve_context"
	| "select_examples"
	| "generate_sql"
	| "execute_sql"
	| "analyze_results"

/**
 * Fields present on every state record. Stage names are appended to
 * steps_completed as they finish; a "_error" or "_blocked" suffix marks
 * the stage that failed.
 */
interface WorkflowStateBase {
	query_id: string
	query: string
	timestamp: string
	steps_completed: string[]
	relevant_context: ContextDocument[]
	retrieved_tables: string[]
	sql_validation_errors: string[]
}

export interface CompletedWorkflowState extends WorkflowStateBase {
	status: "completed"
	generated_sql: string
	query_results: ResultRow[]
	column_names: string[]
	/** Seconds spent executing the SQL */
	execution_time: number
	analysis: string
}

export interface FailedWorkflowState extends WorkflowStateBase {
	status: "failed"
	failed_stage: WorkflowStage
	error: string
	friendly_error: string
	generated_sql?: string
	query_results?: ResultRow[]
	column_names?: string[]
	execution_time?: number
	analysis?: string
}

export type WorkflowState = CompletedWorkflowState | FailedWorkflowState
