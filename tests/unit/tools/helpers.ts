/**
 * Helpers for tool handler tests: a server context over a temp store and a
 * scripted client, plus response parsing.
 */

import { loadProtocolConfig, type ProtocolConfigOverrides } from '../../../src/server/config.js';
import { createServerContext, type ServerContext } from '../../../src/server/context.js';
import type { ToolResponse } from '../../../src/tools/shared.js';
import type { ProposalClient } from '../../../src/services/llm/client.js';
import { openTempStore, type TempStore } from '../helpers.js';

export interface ToolHarness {
  ctx: ServerContext;
  temp: TempStore;
}

export function toolHarness(client: ProposalClient, overrides: ProtocolConfigOverrides = {}): ToolHarness {
  const temp = openTempStore('protocol-tools-');
  const config = loadProtocolConfig({ loop: { preflight: false }, ...overrides }, {});
  return { ctx: createServerContext(config, { client, store: temp.store }), temp };
}

export function parseResponse(response: ToolResponse): unknown {
  return JSON.parse(response.content[0].text);
}
