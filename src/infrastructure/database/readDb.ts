import { config } from '../../config';
import { createDatabase } from './pool';

// PostgreSQL Read Database (CQRS read model), sized for read-heavy workloads
export const readDb = createDatabase('Read DB', config.readDb, 30);

export default readDb;
