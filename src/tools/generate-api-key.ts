#!/usr/bin/env node
import { randomInt } from 'crypto';
import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { loadCredentials } from '../credentials/index.js';

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_';
const DEFAULT_APPNAMES = ['APP1', 'WEBAPP', 'MOBILE'];

export function generateApiKey(length = 32): string {
  if (!Number.isInteger(length) || length < 16) {
    throw new RangeError('API keys must be at least 16 characters long');
  }
  let key = '';
  for (let i = 0; i < length; i++) {
    key += ALPHABET[randomInt(ALPHABET.length)];
  }
  return key;
}

/**
 * Build an API_KEYS value with one fresh key per application name.
 */
export function buildApiKeysValue(appnames: readonly string[], length = 32): string {
  const unique = [...new Set(appnames.map((name) => name.trim()).filter((name) => name !== ''))];
  if (unique.length === 0) {
    throw new Error('At least one application name is required');
  }
  return JSON.stringify(unique.map((appname) => ({ appname, key: generateApiKey(length) })));
}

function main(argv: string[]): void {
  const value = buildApiKeysValue(argv.length > 0 ? argv : DEFAULT_APPNAMES);

  // Same parser as the gateway, so what is printed is what will load
  const { credentials, error } = loadCredentials(value);
  if (error) {
    throw error;
  }

  const [first] = credentials;
  const out = process.stdout;
  out.write('Generated API keys:\n');
  for (const { identity, token } of credentials) {
    out.write(`  ${identity}: ${token}\n`);
  }
  out.write('\nAdd this line to your .env file (or export it in the environment):\n');
  out.write(`API_KEYS='${value}'\n`);
  out.write('\nExample request:\n');
  out.write('curl -X POST "http://localhost:5000/query" \\\n');
  out.write('  -H "Content-Type: application/json" \\\n');
  out.write(`  -H "Authorization: Bearer ${first.token}" \\\n`);
  out.write('  -d \'{"query": "Hello, how are you?"}\'\n');
}

// npm links bin entries, so compare against the resolved script path
if (process.argv[1] && import.meta.url === pathToFileURL(realpathSync(process.argv[1])).href) {
  main(process.argv.slice(2));
}
