export type { SummaryItem } from "./formatters";
export {
  formatStatus,
  formatSummary,
  formatTableRow,
  formatTableSeparator,
  formatTimestamp,
  TABLE_WIDTHS,
} from "./formatters";
export { color, NAME, ui, VERSION } from "./output";
