/**
 * Must be imported first so .env is applied before config.ts reads process.env.
 * This is the server's own .env; task dotenv files are read per run by env/dotenv.ts.
 */
import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const projectRoot = path.resolve(__dirname, '..');

dotenv.config({ path: path.join(projectRoot, '.env'), override: true });
dotenv.config({ path: path.resolve(process.cwd(), '.env'), override: true });
