import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envPath = path.resolve(__dirname, '../../.env');
const result = dotenv.config({ path: envPath });

// Logged from index.ts; the logger reads LOG_LEVEL and must load after this module.
export const envLoadError = result.error ? { message: result.error.message, envPath } : null;
