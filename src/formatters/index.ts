/**
 * Formatters module exports
 */
import type { SyncResult, VerifyResult } from '../types/index.js';
import { OutputFormat } from '../types/index.js';
import { formatSyncText, formatVerifyText } from './text.js';
import type { TextFormatOptions } from './text.js';
import { formatJSON } from './json.js';

export { formatSyncText, formatVerifyText, describeSkipReason } from './text.js';
export type { TextFormatOptions } from './text.js';
export { formatJSON, formatJSONCompact } from './json.js';

export function formatSync(result: SyncResult, outputFormat: OutputFormat, options: TextFormatOptions = {}): string {
  switch (outputFormat) {
    case OutputFormat.Text:
      return formatSyncText(result, options);
    case OutputFormat.JSON:
      return formatJSON(result);
  }
}

export function formatVerify(result: VerifyResult, outputFormat: OutputFormat, options: TextFormatOptions = {}): string {
  switch (outputFormat) {
    case OutputFormat.Text:
      return formatVerifyText(result, options);
    case OutputFormat.JSON:
      return formatJSON(result);
  }
}
