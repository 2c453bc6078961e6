#!/usr/bin/env tsx

/**
 * Create the support tables and load team members and FAQ entries.
 *
 * Usage:
 *   npm run db:init                       # seeds from data/seed.json
 *   npm run db:init -- path/to/seed.json
 */

import 'dotenv/config';
import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { loadEnvironment } from '../src/config/environment';
import { createSupportStore } from '../src/config/persistence';
import { logger, toError } from '../src/utils/logger';

export const SeedSchema = z.object({
  teams: z.array(z.object({ name: z.string().min(1), bio: z.string() })).default([]),
  faq: z.array(z.object({ question: z.string().min(1), answer: z.string() })).default([])
});

export type SeedData = z.infer<typeof SeedSchema>;

export async function readSeedFile(filePath: string): Promise<SeedData> {
  const content = await fs.readFile(filePath, 'utf-8');
  return SeedSchema.parse(JSON.parse(content));
}

async function main(): Promise<void> {
  const seedPath = process.argv[2] ?? path.join(__dirname, '..', 'data', 'seed.json');
  const config = loadEnvironment();

  const seed = await readSeedFile(seedPath);
  const store = createSupportStore(config);

  try {
    await store.init();
    await store.addTeamMembers(seed.teams);
    await store.addFaqEntries(seed.faq);
  } finally {
    await store.close();
  }

  console.log(`✅ Support database ready (${config.database.adapter})`);
  console.log(`   - Team members added: ${seed.teams.length}`);
  console.log(`   - FAQ entries added: ${seed.faq.length}`);

  logger.info('Support database seeded', {
    operation: 'database_seed'
  }, {
    adapter: config.database.adapter,
    teams: seed.teams.length,
    faq: seed.faq.length
  });
}

if (require.main === module) {
  main().catch(error => {
    console.error('❌ Database initialization failed:', toError(error).message);
    logger.error('Database initialization failed', toError(error), {
      operation: 'database_seed'
    });
    process.exit(1);
  });
}
