/**
 * switchboard — per-user prompt and provider resolution for chat front-ends.
 *
 * Entry point. Loads config and the default prompt, opens the
 * database, wires the engine together, starts the server.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { resolve } from 'node:path';

import { openDatabase, createUserStore, createPromptStore, createForceStateStore } from './db/index.js';
import { loadConfig } from './core/config.js';
import { createAccessGate } from './core/access.js';
import { createPermissionService } from './core/permissions.js';
import { createForceMode } from './core/force-mode.js';
import { createProviderRegistry } from './core/provider-registry.js';
import { createPromptResolver } from './core/prompt-resolver.js';
import { createAssembler } from './core/assembler.js';
import { createResponder } from './core/responder.js';
import { createAdapterTable } from './llm/index.js';
import { createAPI } from './server/api.js';

const DATA_DIR = process.env.SWITCHBOARD_DATA_DIR ?? resolve(process.cwd(), 'data');

async function main() {
  // 1. Config + static default prompt (fatal if missing)
  console.log(`  data:      ${DATA_DIR}`);
  const config = loadConfig(DATA_DIR);

  // 2. Database
  console.log(`  db:        ${config.databasePath}`);
  const db = openDatabase(config.databasePath);
  const users = createUserStore(db);
  const prompts = createPromptStore(db);

  const seeded = users.seedAdmins(config.access.adminIds);
  if (seeded > 0) console.log(`  access:    seeded ${seeded} admin(s)`);

  // 3. Shared state, owned here and handed to whoever needs it
  const gate = createAccessGate({ adminIds: config.access.adminIds, findUser: users.find });
  const force = createForceMode(config.prompts.persistForceMode ? createForceStateStore(db) : null);
  const registry = createProviderRegistry({
    providers: config.providers.params,
    initial: config.providers.initial,
    gate,
  });

  // 4. Engine
  const permissions = createPermissionService({ users, gate, defaultLevel: config.access.defaultLevel });
  const resolver = createPromptResolver({
    prompts,
    force,
    gate,
    defaultPrompt: config.prompts.defaultPrompt,
    maxLength: config.prompts.maxLength,
    historyLimit: config.prompts.historyLimit,
  });
  const adapters = createAdapterTable(config.providers.entries);
  const responder = createResponder({
    assemble: createAssembler({ registry, resolver }),
    adapters,
    fixpyPrompt: config.prompts.fixpyPrompt,
  });

  console.log(`  providers: ${registry.listProviders().join(', ')} (active: ${registry.getActive().provider})`);
  console.log(`  fixpy:     ${config.prompts.fixpyPrompt ? 'on' : 'off (no fixpy prompt)'}`);
  console.log(`  force:     ${force.enabled ? 'on' : 'off'}${config.prompts.persistForceMode ? '' : ' (not persisted)'}`);

  const adapter = adapters.get(registry.getActive().provider);
  if (adapter && !(await adapter.health())) {
    console.warn(`  ⚠  ${adapter.name} is not reachable. Chat requests will fail until it is.`);
  }

  // 5. Server
  const app = createAPI({
    frontendToken: config.access.frontendToken,
    gate,
    permissions,
    registry,
    resolver,
    responder,
    adapters,
  });

  const { port, host } = config.server;
  const server = serve({ fetch: app.fetch, port, hostname: host }, () => {
    console.log(`  ✓ listening on http://${host}:${port}`);
  });

  const shutdown = () => {
    server.close(() => {
      db.close();
      process.exit(0);
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('Failed to start switchboard:', error);
  process.exit(1);
});
