/**
 * Shared Tool Utilities
 *
 * Response formatting and error handling used by every tool module.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/shared
 */

import { z } from 'zod';

import { ProtocolError, formatErrorResponse } from '../server/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** MCP tool response format */
export type ToolResponse = { content: Array<{ type: 'text'; text: string }>; isError?: boolean };

type ToolHandler = (params: Record<string, unknown>) => Promise<ToolResponse>;

export interface ToolDefinition {
  description: string;
  inputSchema: Record<string, z.ZodTypeAny>;
  handler: ToolHandler;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/** Responses above this size get their arrays capped */
export const MAX_RESPONSE_BYTES = 700 * 1024;

/** Successive per-array caps tried until the response fits */
const ARRAY_CAPS = [500, 100, 20];

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function capArrays(value: unknown, cap: number, path: string, truncated: string[]): unknown {
  if (Array.isArray(value)) {
    if (value.length > cap) {
      truncated.push(`${path || '<root>'} (${value.length} → ${cap})`);
    }
    return value.slice(0, cap).map((item, i) => capArrays(item, cap, `${path}[${i}]`, truncated));
  }
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = capArrays(item, cap, path ? `${path}.${key}` : key, truncated);
    }
    return out;
  }
  return value;
}

/**
 * Format a tool result as MCP text content. Oversized results have their
 * arrays capped and carry a `_response_truncated` note.
 */
export function formatResponse(result: unknown): ToolResponse {
  const json = JSON.stringify(result, null, 2);
  if (json.length <= MAX_RESPONSE_BYTES) {
    return { content: [{ type: 'text', text: json }] };
  }

  for (const cap of ARRAY_CAPS) {
    const truncated: string[] = [];
    const capped = capArrays(result, cap, '', truncated);
    const note = {
      reason: `Response exceeded ${Math.round(MAX_RESPONSE_BYTES / 1024)}KB limit`,
      truncated_fields: truncated,
      suggestion: 'Use protocol_export to write the full artifacts to disk',
    };
    const body = isRecord(capped) ? { ...capped, _response_truncated: note } : { result: capped, _response_truncated: note };
    const text = JSON.stringify(body, null, 2);
    if (text.length <= MAX_RESPONSE_BYTES) {
      return { content: [{ type: 'text', text }] };
    }
  }

  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(
          {
            _response_truncated: {
              reason: `Response exceeded ${Math.round(MAX_RESPONSE_BYTES / 1024)}KB limit and could not be reduced`,
              original_size_bytes: json.length,
              suggestion: 'Use protocol_export to write the full artifacts to disk',
            },
          },
          null,
          2
        ),
      },
    ],
  };
}

/**
 * Render any failure as the structured error envelope
 */
export function handleError(error: unknown): ToolResponse {
  const protocolError = ProtocolError.fromUnknown(error);
  console.error(`[ERROR] ${protocolError.category}: ${protocolError.message}`);
  return {
    content: [{ type: 'text', text: JSON.stringify(formatErrorResponse(protocolError), null, 2) }],
    isError: true,
  };
}
