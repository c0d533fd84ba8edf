export type { RecordSink } from "./types.js";
export type { FormatOptions } from "./csv-format.js";
export { HEADER_COLUMNS, formatHeader, formatRecord } from "./csv-format.js";
export type { CsvSinkOptions } from "./csv-sink.js";
export { CsvSink } from "./csv-sink.js";
export { MemorySink } from "./memory-sink.js";
export { writeSeries } from "./write-series.js";
