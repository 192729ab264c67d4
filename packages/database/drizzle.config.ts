import type { Config } from 'drizzle-kit'

const databaseUrl = process.env.DATABASE_URL
if (!databaseUrl) {
  throw new Error('DATABASE_URL is required to run drizzle-kit')
}

export default {
  schema: ['./src/schema.ts'],
  dialect: 'mysql',
  dbCredentials: {
    url: databaseUrl,
  },
  tablesFilter: ['TRIAGE_*'],
  out: './src/drizzle',
} satisfies Config
