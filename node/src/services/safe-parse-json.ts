/**
 * Shared JSON parsing for LLM replies: strips markdown fences, normalizes quotes.
 * Used by the structured LLM gateway (whole reply) and planning (last ```json block).
 */
import { LlmOutputError } from './errors';

const JSON_BLOCK_RE = /```json([\s\S]*?)```/g;

function stripFences(raw: string): string {
  let txt = raw.trim();

  if (txt.startsWith('```')) {
    const firstNewline = txt.indexOf('\n');
    const lastFence = txt.lastIndexOf('```');
    if (firstNewline !== -1 && lastFence !== -1 && lastFence > firstNewline) {
      txt = txt.slice(firstNewline + 1, lastFence).trim();
    } else {
      txt = txt.replace(/^```\w*\n?/, '').replace(/\n?```$/, '').trim();
    }
  }
  return txt;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parse a reply that should be one JSON object. Throws LlmOutputError otherwise. */
export function parseJsonObject(raw: string, context: string): Record<string, unknown> {
  const txt = stripFences(raw);

  let parsed: unknown;
  try {
    parsed = JSON.parse(txt);
  } catch {
    try {
      parsed = JSON.parse(txt.replace(/'/g, '"'));
    } catch {
      throw new LlmOutputError(`${context}: reply is not valid JSON`, { raw: txt.slice(0, 300) });
    }
  }

  if (!isRecord(parsed)) {
    throw new LlmOutputError(`${context}: reply is not a JSON object`, { raw: txt.slice(0, 300) });
  }
  return parsed;
}

/** Parse the last ```json fenced block of a free-form reply. */
export function parseLastJsonBlock(raw: string, context: string): unknown {
  const blocks = [...raw.matchAll(JSON_BLOCK_RE)];
  const last = blocks[blocks.length - 1];
  if (!last) {
    throw new LlmOutputError(`${context}: reply has no \`\`\`json block`, { raw: raw.slice(0, 300) });
  }
  try {
    return JSON.parse(last[1]);
  } catch (err) {
    throw new LlmOutputError(`${context}: last \`\`\`json block is not valid JSON`, {
      raw: last[1].slice(0, 300),
      error: err instanceof Error ? err.message : String(err),
    });
  }
}
