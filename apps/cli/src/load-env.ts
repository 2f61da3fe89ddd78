/**
 * Load .env.local (then .env) before anything reads process.env.
 * Import this first: import './load-env.js'
 */
import { config } from 'dotenv';
import path from 'node:path';

config({ path: path.resolve(process.cwd(), '.env.local') });
config();
