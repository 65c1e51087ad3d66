/**
 * Format Module Public API
 *
 * @module src/format
 */

export type { NormalizedTable, ResultFormat, TableSink } from "./types";

export type { MissingOutcome, Outcome, PrimaryOutcome, SecondaryOutcome } from "./outcome";
export {
	formatNumber,
	missingOutcome,
	outcomeMetricCells,
	outcomeMetricName,
	outcomeRole,
	primaryOutcome,
	secondaryOutcome,
	trimPunctuation,
} from "./outcome";

export {
	collectParameterNames,
	collectSecondaryMetricNames,
	InconsistentParametersError,
	METRIC_COLUMNS,
	normalize,
	NormalizedFormat,
} from "./normalized";

export { encodeCsv, encodeCsvField, encodeCsvRecord } from "./csv";

export type { StreamTableSinkOptions } from "./sinks";
export { atomicWriteText, FileTableSink, MemoryTableSink, StreamTableSink } from "./sinks";
