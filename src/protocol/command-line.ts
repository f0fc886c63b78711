import { formatHex, parseHex } from '../common/utils/hex';
import { CommandReply } from '../broker/interfaces/command-reply.interface';
import {
  CommandVerb,
  isCommandVerb,
} from '../queue/interfaces/command.interface';

export type ParsedLine =
  | { ok: true; verb: CommandVerb; board: number; target: number }
  | { ok: false; error: string };

/**
 * Parses `VERB BOARD TARGET`, e.g. `SETPIN 0x20 0x0A`. Board and target are
 * hexadecimal; IDENTIFY still takes a (ignored) target field.
 */
export function parseCommandLine(line: string): ParsedLine {
  const fields = line.trim().split(/\s+/).filter((field) => field.length > 0);
  if (fields.length !== 3) {
    return {
      ok: false,
      error: 'Error: commands must have 3 fields: (command, board, data).',
    };
  }

  const [rawVerb, rawBoard, rawTarget] = fields;
  const verb = rawVerb.toUpperCase();
  if (!isCommandVerb(verb)) {
    return {
      ok: false,
      error: `Error: first field must be one of ${Object.values(CommandVerb).join(', ')}.`,
    };
  }

  const board = parseHex(rawBoard);
  if (board === null) {
    return { ok: false, error: 'Error: wrongly formatted board address.' };
  }

  const target = parseHex(rawTarget);
  if (target === null) {
    return { ok: false, error: 'Error: wrongly formatted data byte.' };
  }

  return { ok: true, verb, board, target };
}

export function formatReply(reply: CommandReply, timeoutMs: number): string {
  if (reply.status === 'timeout') {
    return `Error: no answer within ${timeoutMs} ms`;
  }

  const { result } = reply;
  if (!result.ok) {
    return `Error: ${result.error ?? 'command failed'}`;
  }
  return typeof result.value === 'boolean'
    ? 'OK'
    : `${formatHex(result.value)} OK`;
}
