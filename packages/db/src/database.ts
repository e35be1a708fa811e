import {drizzle} from 'drizzle-orm/node-postgres';
import type {Pool} from 'pg';

import type {PortalDatabase} from './repositories/certificateRepository.js';
import {portalSchema} from './schema.js';

export const createPortalDatabase = (pool: Pool): PortalDatabase => drizzle(pool, {schema: portalSchema});
