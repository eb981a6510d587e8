import { config } from '../../config';
import { createDatabase } from './pool';

// PostgreSQL Write Database (ledger journal)
export const writeDb = createDatabase('Write DB', config.writeDb, 20);

export default writeDb;
