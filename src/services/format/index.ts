/**
 * Output formatting
 */

export {
  formatResult,
  formatAsTable,
  formatAsMarkdown,
  formatAsJson,
  OUTPUT_FORMATS,
} from './formatter.js';
export type { OutputFormat, FormattedResult } from './formatter.js';
