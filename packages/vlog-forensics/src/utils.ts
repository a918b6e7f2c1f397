/**
 * Token shapes and verb normalisation shared by the parser, classifier and rules
 */

import type { Field } from "./types.js";

export function normalizeInput(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}

// Short codes used by the framed event format and common shell spellings
const VERB_ALIASES: Record<string, string> = {
  run: "exec",
  execute: "exec",
  execve: "exec",
  del: "delete",
  rm: "delete",
  remove: "delete",
  cre: "create",
  mk: "create",
  touch: "create",
  shd: "shadow-load",
  conn: "connect",
  disc: "disconnect",
  rd: "read",
  wr: "write",
  mv: "move",
  cp: "copy",
};

export function normalizeVerb(action: string | null): string | null {
  if (action === null) return null;
  const verb = action.trim().toLowerCase();
  if (!verb) return null;
  return VERB_ALIASES[verb] ?? verb;
}

const IPV4 = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})(?::(\d{1,5}))?$/;

/** Splits `a.b.c.d` or `a.b.c.d:port`; null when the token is not IPv4-shaped */
export function parseIpToken(token: string): { address: string; port: number | null } | null {
  const match = token.match(IPV4);
  if (!match) return null;
  const octets = match.slice(1, 5).map(Number);
  if (octets.some((octet) => octet > 255)) return null;
  const port = match[5] === undefined ? null : Number(match[5]);
  if (port !== null && !isPort(port)) return null;
  return { address: octets.join("."), port };
}

export function isIpAddress(token: string): boolean {
  return parseIpToken(token) !== null;
}

export function isPort(value: number): boolean {
  return Number.isInteger(value) && value > 0 && value <= 65535;
}

export function isPathLike(token: string): boolean {
  return /^(\/|~\/|\.{1,2}\/|[A-Za-z]:\\)\S*/.test(token);
}

export function isNumeric(token: string): boolean {
  return /^\d+$/.test(token);
}

export function isIdentifier(token: string): boolean {
  return /^[A-Za-z][\w.@-]*$/.test(token) && !isIpAddress(token);
}

/** First value among `keys`, checked in the order given */
export function fieldValue(fields: readonly Field[], keys: readonly string[]): string | null {
  for (const key of keys) {
    const field = fields.find((f) => f.key === key);
    if (field && field.value.trim() !== "") return field.value.trim();
  }
  return null;
}

export const TARGET_KEYS = ["target", "path", "file", "filename", "dest", "exe"] as const;

export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
