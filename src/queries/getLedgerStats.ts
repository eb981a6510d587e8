import { getLedgerRuntime } from '../ledger/runtime';
import { LedgerStats } from '../models/ledger';

export const getLedgerStatsHandler = async (): Promise<LedgerStats> => getLedgerRuntime().engine.getStats();

export default getLedgerStatsHandler;
