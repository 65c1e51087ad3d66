/**
 * CSV Encoding and Sink Tests
 *
 * @module tests/format/csv.test.ts
 */

import { access, mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PassThrough } from "node:stream";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { encodeCsv, encodeCsvField, encodeCsvRecord } from "../../src/format/csv";
import { FileTableSink, MemoryTableSink, StreamTableSink } from "../../src/format/sinks";

// =============================================================================
// Encoding
// =============================================================================

describe("encodeCsvField", () => {
	test("leaves plain fields unquoted", () => {
		expect(encodeCsvField("plain")).toBe("plain");
		expect(encodeCsvField("gc.alloc.rate")).toBe("gc.alloc.rate");
		expect(encodeCsvField("")).toBe("");
	});

	test("quotes fields containing the delimiter", () => {
		expect(encodeCsvField("Throughput, ops/time")).toBe('"Throughput, ops/time"');
	});

	test("doubles embedded quotes", () => {
		expect(encodeCsvField('say "hi"')).toBe('"say ""hi"""');
	});

	test("quotes line breaks and surrounding whitespace", () => {
		expect(encodeCsvField("a\nb")).toBe('"a\nb"');
		expect(encodeCsvField("a\r\nb")).toBe('"a\r\nb"');
		expect(encodeCsvField(" lead")).toBe('" lead"');
		expect(encodeCsvField("trail ")).toBe('"trail "');
	});
});

describe("encodeCsvRecord", () => {
	test("joins fields and terminates the record with CRLF", () => {
		expect(encodeCsvRecord(["a", "b,c", "d"])).toBe('a,"b,c",d\r\n');
	});
});

describe("encodeCsv", () => {
	test("encodes every record", () => {
		expect(encodeCsv([["x", "1"], ["y", "2"]])).toBe("x,1\r\ny,2\r\n");
	});

	test("encodes no records as an empty string", () => {
		expect(encodeCsv([])).toBe("");
	});
});

// =============================================================================
// Sinks
// =============================================================================

describe("MemoryTableSink", () => {
	test("copies records and renders them as CSV", async () => {
		const sink = new MemoryTableSink();
		const record = ["a", "b"];

		await sink.writeRecord(record);
		record[0] = "changed";
		await sink.close();

		expect(sink.getRecords()).toEqual([["a", "b"]]);
		expect(sink.toCsv()).toBe("a,b\r\n");
	});
});

describe("StreamTableSink", () => {
	test("writes encoded records to the stream", async () => {
		const stream = new PassThrough();
		const chunks: string[] = [];
		stream.on("data", (chunk: Buffer) => chunks.push(chunk.toString("utf-8")));

		const sink = new StreamTableSink(stream, { end: true });
		await sink.writeRecord(["Test", "Metric"]);
		await sink.writeRecord(["bench.A", "Throughput, ops/time"]);
		await sink.close();

		expect(chunks.join("")).toBe('Test,Metric\r\nbench.A,"Throughput, ops/time"\r\n');
		expect(stream.writableEnded).toBe(true);
	});

	test("leaves the stream open by default", async () => {
		const stream = new PassThrough();
		stream.resume();

		const sink = new StreamTableSink(stream);
		await sink.writeRecord(["x"]);
		await sink.close();

		expect(stream.writableEnded).toBe(false);
		stream.end();
	});
});

describe("FileTableSink", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "bench-normalize-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	test("writes the CSV file on close", async () => {
		const filePath = join(dir, "nested", "table.csv");
		const sink = new FileTableSink(filePath);

		await sink.writeRecord(["Test", "size"]);
		await sink.writeRecord(["bench.A", "10"]);
		await sink.close();

		expect(await readFile(filePath, "utf-8")).toBe("Test,size\r\nbench.A,10\r\n");
		await expect(access(`${filePath}.tmp`)).rejects.toThrow();
	});

	test("creates no file when nothing was written", async () => {
		const filePath = join(dir, "empty.csv");

		await new FileTableSink(filePath).close();

		await expect(access(filePath)).rejects.toThrow();
	});
});
