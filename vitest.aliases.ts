/**
 * Vitest alias configuration for workspace packages.
 *
 * Each package resolves to its TypeScript sources so tests need no build.
 */

import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export type AliasEntry = { find: string; replacement: string };

export const aliases: AliasEntry[] = [
  { find: "@murmur/shared", replacement: path.resolve(__dirname, "packages/shared/src/index.ts") },
  { find: "@murmur/voice", replacement: path.resolve(__dirname, "packages/voice/src/index.ts") },
];
