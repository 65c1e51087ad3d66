/**
 * Result Format Types
 *
 * Contracts between the table builder, result formats and output sinks.
 *
 * @module src/format/types
 */

import type { RunResult } from "../../types/results";

/**
 * A rectangular table: every row has `header.length` cells.
 * An empty export has no header and no rows.
 */
export interface NormalizedTable {
	readonly header: readonly string[];
	readonly rows: readonly (readonly string[])[];
}

/**
 * Destination for table records. Implementations own the encoding.
 */
export interface TableSink {
	/**
	 * Write one record.
	 *
	 * @param record - Cells of a header or data row
	 */
	writeRecord(record: readonly string[]): Promise<void>;

	/**
	 * Flush pending records and release resources.
	 */
	close(): Promise<void>;
}

/**
 * Exports a collection of run results.
 */
export interface ResultFormat {
	writeOut(runs: readonly RunResult[]): Promise<void>;
}
