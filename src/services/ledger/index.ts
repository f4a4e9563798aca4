/**
 * Ledger services
 */

import { Ledger } from './ledger.js';
import { getDatabase, closeDatabase } from '../store/manager.js';

export { Ledger, formatIncomplete } from './ledger.js';
export type { QueryOptions } from './ledger.js';
export { mergeDayRecord } from './merge.js';
export { aggregateOvertime, workingHours } from './overtime.js';
export { selectDays, matchesFilter, filterKey } from './selector.js';
export type { SelectOptions } from './selector.js';
export { dumpTables, renderDump, dumpValue } from './dump.js';
export type { DumpResult } from './dump.js';

let ledgerInstance: Ledger | null = null;

/**
 * Ledger bound to the process-wide database connection
 */
export function getLedger(): Ledger {
  if (!ledgerInstance) {
    ledgerInstance = new Ledger(getDatabase());
  }
  return ledgerInstance;
}

/**
 * Drop the ledger and close its connection
 */
export function resetLedger(): void {
  ledgerInstance = null;
  closeDatabase();
}
