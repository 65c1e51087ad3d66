/**
 * Table Sinks
 *
 * TableSink implementations writing CSV to streams, files and memory.
 *
 * @module src/format/sinks
 */

import { once } from "node:events";
import { mkdir, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { Writable } from "node:stream";
import { finished } from "node:stream/promises";
import { encodeCsv, encodeCsvRecord } from "./csv";
import type { TableSink } from "./types";

// =============================================================================
// Atomic Write Helpers
// =============================================================================

/**
 * Atomically write text to a file.
 * Writes to a temp file first, then renames to prevent corruption.
 *
 * @param path - Target file path
 * @param text - File contents
 */
export async function atomicWriteText(path: string, text: string): Promise<void> {
	const tempPath = `${path}.tmp`;

	await mkdir(dirname(path), { recursive: true });
	await writeFile(tempPath, text, { encoding: "utf-8" });

	// Atomic rename (POSIX guarantees atomicity)
	await rename(tempPath, path);
}

// =============================================================================
// MemoryTableSink
// =============================================================================

/**
 * Keeps records in memory.
 */
export class MemoryTableSink implements TableSink {
	protected readonly records: (readonly string[])[] = [];

	async writeRecord(record: readonly string[]): Promise<void> {
		this.records.push([...record]);
	}

	async close(): Promise<void> {}

	getRecords(): readonly (readonly string[])[] {
		return this.records;
	}

	toCsv(): string {
		return encodeCsv(this.records);
	}
}

// =============================================================================
// FileTableSink
// =============================================================================

/**
 * Buffers records and writes the CSV file atomically on close.
 * No file is created if no record was written.
 */
export class FileTableSink extends MemoryTableSink {
	constructor(readonly filePath: string) {
		super();
	}

	async close(): Promise<void> {
		if (this.records.length === 0) {
			return;
		}
		await atomicWriteText(this.filePath, this.toCsv());
	}
}

// =============================================================================
// StreamTableSink
// =============================================================================

export interface StreamTableSinkOptions {
	/** End the stream on close (default: false, so stdout stays open) */
	readonly end?: boolean;
}

/**
 * Writes CSV records to a stream as they arrive, honouring backpressure.
 */
export class StreamTableSink implements TableSink {
	private readonly end: boolean;

	constructor(
		private readonly stream: Writable,
		options: StreamTableSinkOptions = {},
	) {
		this.end = options.end ?? false;
	}

	async writeRecord(record: readonly string[]): Promise<void> {
		if (!this.stream.write(encodeCsvRecord(record))) {
			await once(this.stream, "drain");
		}
	}

	async close(): Promise<void> {
		if (!this.end) {
			return;
		}
		this.stream.end();
		await finished(this.stream);
	}
}
