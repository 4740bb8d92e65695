/**
 * API routes for switchboard.
 *
 * The chat front-end is the only client. It authenticates with a
 * shared bearer token and says who the end user is in X-User-Id.
 * Every user is created on first sight, then each route runs its
 * guard before touching any state.
 *
 *   /api/providers  — list / switch backend
 *   /api/chat       — single-turn chat
 *   /api/fixpy      — code fixing with the fixed prompt
 *   /api/prompt     — system prompt set / reset / reuse / force
 *   /api/access     — grant / revoke / check
 */

import { Hono } from 'hono';
import { createMiddleware } from 'hono/factory';
import { z } from 'zod';
import type { ProviderName, RequiredLevel } from '../types/index.js';
import type { AccessGate } from '../core/access.js';
import type { PermissionService } from '../core/permissions.js';
import type { ProviderRegistry } from '../core/provider-registry.js';
import type { PromptResolver } from '../core/prompt-resolver.js';
import type { Responder } from '../core/responder.js';
import type { AdapterTable } from '../llm/index.js';
import { EngineError, InvalidInput, NotFound, describeError } from '../core/errors.js';

type Env = { Variables: { userId: string } };

export interface APIDeps {
  frontendToken: string;
  gate: AccessGate;
  permissions: PermissionService;
  registry: ProviderRegistry;
  resolver: PromptResolver;
  responder: Responder;
  adapters: AdapterTable;
}

const ProviderBody = z.object({ provider: z.string().min(1) });
const ChatBody = z.object({ message: z.string() });
const PromptBody = z.object({ text: z.string() });
const FixpyBody = z.object({ code: z.string() });

const HEALTH_TTL_MS = 30_000;

async function readBody<T>(req: Request, schema: z.ZodType<T>): Promise<T> {
  const json: unknown = await req.json().catch(() => null);
  const result = schema.safeParse(json);
  if (!result.success) {
    const first = result.error.issues[0];
    throw new InvalidInput(first ? `${first.path.join('.') || 'body'}: ${first.message}` : 'Invalid body');
  }
  return result.data;
}

function parseRecordId(raw: string): number {
  // Malformed ids look the same as ids that don't exist
  if (!/^\d{1,15}$/.test(raw)) throw new NotFound();
  return Number(raw);
}

export function createAPI(deps: APIDeps) {
  const { frontendToken, gate, permissions, registry, resolver, responder, adapters } = deps;
  const api = new Hono<Env>();

  /** Middleware: front-end token + user identity */
  const identify = createMiddleware<Env>(async (c, next) => {
    const token = c.req.header('Authorization')?.replace('Bearer ', '');
    if (token !== frontendToken) {
      return c.json({ error: { code: 'unauthorized', message: 'Unauthorized' } }, 401);
    }

    const userId = c.req.header('X-User-Id')?.trim();
    if (!userId) {
      return c.json({ error: { code: 'unauthorized', message: 'Missing X-User-Id' } }, 401);
    }

    permissions.ensureUser(userId);
    c.set('userId', userId);
    await next();
  });

  /** Guard: short-circuits with 403 before any handler logic */
  const requireLevel = (level: RequiredLevel) =>
    createMiddleware<Env>(async (c, next) => {
      gate.require(c.get('userId'), level);
      await next();
    });

  const standard = requireLevel('standard');
  const admin = requireLevel('admin');

  api.use('/api/*', async (c, next) => {
    if (c.req.path === '/api/health') return next();
    return identify(c, next);
  });

  // ── Providers ──────────────────────────────────────────

  api.get('/api/providers', standard, (c) => {
    const active = registry.getActive();
    return c.json({
      providers: registry.listProviders().map(name => ({
        name,
        displayName: registry.displayName(name),
      })),
      active: {
        name: active.provider,
        displayName: registry.displayName(active.provider),
        model: active.params.model,
      },
    });
  });

  api.put('/api/providers/active', admin, async (c) => {
    const { provider } = await readBody(c.req.raw, ProviderBody);
    const selection = registry.setActive(c.get('userId'), provider);
    return c.json({
      active: {
        name: selection.provider,
        displayName: registry.displayName(selection.provider),
        model: selection.params.model,
      },
    });
  });

  // ── Chat ───────────────────────────────────────────────

  api.post('/api/chat', standard, async (c) => {
    const { message } = await readBody(c.req.raw, ChatBody);
    const result = await responder.respond(c.get('userId'), message, c.req.raw.signal);
    return c.json(result);
  });

  api.post('/api/fixpy', standard, async (c) => {
    const { code } = await readBody(c.req.raw, FixpyBody);
    const result = await responder.fixCode(c.get('userId'), code, c.req.raw.signal);
    return c.json(result);
  });

  // ── System prompt ──────────────────────────────────────

  api.get('/api/prompt', standard, (c) => {
    return c.json(resolver.describe(c.get('userId')));
  });

  api.put('/api/prompt', standard, async (c) => {
    const { text } = await readBody(c.req.raw, PromptBody);
    const prompt = resolver.setPrompt(c.get('userId'), text);
    return c.json({ prompt, masked: resolver.describe(c.get('userId')).mode === 'forced' }, 201);
  });

  api.delete('/api/prompt', standard, (c) => {
    const previous = resolver.resetPrompt(c.get('userId'));
    return c.json({ reset: previous !== null });
  });

  api.get('/api/prompt/history', standard, (c) => {
    return c.json({ prompts: resolver.listHistory(c.get('userId')) });
  });

  api.post('/api/prompt/history/:id/reuse', standard, (c) => {
    const id = parseRecordId(c.req.param('id'));
    const prompt = resolver.reusePrompt(c.get('userId'), id);
    return c.json({ prompt, masked: resolver.describe(c.get('userId')).mode === 'forced' });
  });

  api.post('/api/prompt/force', admin, (c) => {
    return c.json({ force: resolver.forceDefault(c.get('userId')) });
  });

  api.delete('/api/prompt/force', admin, (c) => {
    return c.json({ force: resolver.unlock(c.get('userId')) });
  });

  // ── Access ─────────────────────────────────────────────

  api.put('/api/access/:target', admin, (c) => {
    const user = permissions.grant(c.get('userId'), c.req.param('target'));
    return c.json({ id: user.id, level: user.level });
  });

  api.delete('/api/access/:target', admin, (c) => {
    const user = permissions.revoke(c.get('userId'), c.req.param('target'));
    return c.json({ id: user.id, level: user.level });
  });

  api.get('/api/access/:target', (c) => {
    const target = c.req.param('target');
    return c.json({ id: target, level: permissions.check(c.get('userId'), target) });
  });

  // ── Health ─────────────────────────────────────────────

  // At most one probe per provider per HEALTH_TTL_MS
  let lastHealth: { provider: string; healthy: boolean; checkedAt: number } | null = null;

  async function checkHealth(provider: ProviderName): Promise<boolean> {
    const now = Date.now();
    if (lastHealth && lastHealth.provider === provider && now - lastHealth.checkedAt < HEALTH_TTL_MS) {
      return lastHealth.healthy;
    }
    const adapter = adapters.get(provider);
    const healthy = adapter ? await adapter.health() : false;
    lastHealth = { provider, healthy, checkedAt: now };
    return healthy;
  }

  api.get('/api/health', async (c) => {
    const { provider } = registry.getActive();
    const healthy = await checkHealth(provider);
    return c.json({
      status: healthy ? 'ok' : 'degraded',
      provider,
      llm: healthy ? 'connected' : 'unreachable',
    });
  });

  // ── Errors ─────────────────────────────────────────────

  api.onError((err, c) => {
    if (err instanceof EngineError) {
      if (err.status === 500) {
        console.error(`[api] ${c.req.method} ${c.req.path}: ${describeError(err)}`);
      }
      return c.json({ error: { code: err.code, message: err.publicMessage } }, err.status);
    }

    console.error(`[api] ${c.req.method} ${c.req.path}: ${describeError(err)}`);
    return c.json({
      error: { code: 'internal_error', message: 'Something went wrong while processing the request' },
    }, 500);
  });

  return api;
}
