import fs from 'fs';
import path from 'path';
import { AdvisorConfig } from './types';
import { validateConfig } from './schema';

export const defaultConfigPath = () => path.resolve(process.cwd(), 'src/config/default.json');

export const ensureDir = (dir: string) => {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

export const readJSONFile = (filePath: string): unknown => {
  const raw = fs.readFileSync(filePath, 'utf-8');
  return JSON.parse(raw);
};

export const writeJSONFile = (filePath: string, data: unknown) => {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
};

export const loadConfig = (configPath: string = defaultConfigPath()): AdvisorConfig => {
  return validateConfig(readJSONFile(configPath));
};

export const mulberry32 = (seed: number) => {
  let t = seed + 0x6d2b79f5;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
};

// FNV-1a
export const hashString = (input: string): number => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
};

export const sum = (arr: number[]): number => arr.reduce((a, b) => a + b, 0);

export const formatUSD = (val: number) =>
  `$${val.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;

// Blank means "not given"; anything else that is not a number comes back NaN for the schema to reject.
export const parseNumber = (raw: string | number | undefined): number | undefined => {
  if (raw === undefined) return undefined;
  if (typeof raw === 'number') return raw;
  const trimmed = raw.trim();
  return trimmed === '' ? undefined : Number(trimmed);
};
