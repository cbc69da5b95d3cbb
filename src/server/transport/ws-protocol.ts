import type { ParsedClientMessage } from '../../shared/protocol-schema.js';
import type { HelloMessage } from '../../shared/protocol.js';

/** Close code for a channel whose first frame is not a valid hello. */
export const POLICY_VIOLATION = 1008;

export function validateHello(parsed: ParsedClientMessage): { ok: true; hello: HelloMessage } | { ok: false; reason: string } {
  if (!parsed.ok) return { ok: false, reason: parsed.envelope.type === 'hello' ? 'missing clientId' : 'first message must be hello' };
  if (parsed.message.type !== 'hello') return { ok: false, reason: 'first message must be hello' };
  return { ok: true, hello: parsed.message };
}
