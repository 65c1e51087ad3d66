/**
 * CSV Encoding
 *
 * Comma-separated encoding of table records (RFC 4180): CRLF record
 * separators, fields quoted when they contain the delimiter, a quote, a
 * line break, or surrounding whitespace.
 *
 * @module src/format/csv
 */

export const CSV_DELIMITER = ",";
export const CSV_RECORD_SEPARATOR = "\r\n";

const NEEDS_QUOTING = /[",\r\n]|^\s|\s$/;

/**
 * Encode one field, quoting and doubling inner quotes where required.
 *
 * @example
 * encodeCsvField("plain");          // plain
 * encodeCsvField("Throughput, ops/time"); // "Throughput, ops/time"
 * encodeCsvField('say "hi"');       // "say ""hi"""
 */
export function encodeCsvField(field: string): string {
	if (!NEEDS_QUOTING.test(field)) {
		return field;
	}
	return `"${field.replace(/"/g, '""')}"`;
}

/**
 * Encode one record, including its trailing record separator.
 */
export function encodeCsvRecord(record: readonly string[]): string {
	return record.map(encodeCsvField).join(CSV_DELIMITER) + CSV_RECORD_SEPARATOR;
}

/**
 * Encode a sequence of records.
 */
export function encodeCsv(records: readonly (readonly string[])[]): string {
	return records.map(encodeCsvRecord).join("");
}
