/**
 * Server Context
 *
 * Everything a tool handler needs, built once from a ProtocolConfig and
 * passed explicitly; there is no module-level server state.
 *
 * @module server/context
 */

import { LoopActions } from '../services/agent/actions.js';
import { GapClosureLoop } from '../services/agent/gap-closure-loop.js';
import { LLMClient, type ProposalClient } from '../services/llm/client.js';
import { ProtocolPipeline } from '../services/protocol/pipeline.js';
import { JobStore } from '../services/storage/job-store/index.js';
import { PreflightService } from '../services/triage/preflight.js';
import type { ProtocolConfig } from './config.js';

export interface ServerContext {
  config: ProtocolConfig;
  store: JobStore;
  client: ProposalClient;
  pipeline: ProtocolPipeline;
  preflight: PreflightService;
  actions: LoopActions;
  loop: GapClosureLoop;
  close(): void;
}

export interface ContextDependencies {
  /** Replaces the HTTP client, e.g. with a test double */
  client?: ProposalClient;
  store?: JobStore;
}

export function createServerContext(config: ProtocolConfig, deps: ContextDependencies = {}): ServerContext {
  const store = deps.store ?? JobStore.open(config.storage.databasePath);
  const client = deps.client ?? new LLMClient(config.llm);

  const pipeline = new ProtocolPipeline(store, client, {
    windowSpan: config.extraction.windowSpan,
    perFieldLimit: config.extraction.perFieldLimit,
  });
  const preflight = new PreflightService(store, client);
  const actions = new LoopActions(store, pipeline, config.loop.maxSpan);
  const loop = new GapClosureLoop(store, actions, preflight, config.loop);

  return {
    config,
    store,
    client,
    pipeline,
    preflight,
    actions,
    loop,
    close: () => store.close(),
  };
}
