/**
 * Mangodia Bot — src/util/ensureEnv.ts
 * WHAT: requireEnv(name) returns a set, non-blank env value or exits the process.
 * WHY: main() checks DISCORD_TOKEN before login, so a missing token never reaches the gateway.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export function requireEnv(name: string): string {
  const value = process.env[name]?.trim();
  if (value) return value;

  console.error(`[startup] ${name} is not set; add it to .env or the environment`);
  return process.exit(1);
}
