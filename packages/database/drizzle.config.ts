import type { Config } from 'drizzle-kit';

export default {
  schema: './src/schema/**/*.ts',
  out: './drizzle',
  dialect: 'postgresql',
  dbCredentials: {
    url: process.env.DATABASE_URL || 'postgresql://localhost/finledger_dev',
  },
} satisfies Config;
