import { fileURLToPath } from 'node:url';
import { defineConfig } from 'drizzle-kit';
import { config } from 'dotenv';

// Load .env.local from monorepo root
config({ path: fileURLToPath(new URL('../../.env.local', import.meta.url)) });

const databaseUrl = process.env['DATABASE_URL'];
if (databaseUrl === undefined || databaseUrl === '') {
  throw new Error('DATABASE_URL environment variable is required');
}

export default defineConfig({
  out: './drizzle',
  schema: './src/schema/*',
  dialect: 'postgresql',
  dbCredentials: {
    url: databaseUrl,
  },
});
