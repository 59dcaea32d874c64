/**
 * Mistake Ledger - Barrel Export
 */

export { MistakeLedger, ledgerSnapshotSchema } from './mistake-ledger';
export type { LedgerSnapshot, NewMistakeRecord } from './mistake-ledger';
export {
  computeProficiency,
  levelForErrorRate,
  DEFAULT_PROFICIENCY,
  MIN_TURNS_FOR_ESTIMATE,
  BEGINNER_ERROR_RATE,
  INTERMEDIATE_ERROR_RATE,
} from './proficiency';
