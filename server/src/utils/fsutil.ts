import fs from 'fs';
import path from 'path';

export function ensureDirectories(dirs: string[]) {
  for (const dir of dirs) {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }
}

export function writeJson(filePath: string, data: unknown) {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
}

export function readJson(filePath: string): unknown {
  if (!fs.existsSync(filePath)) return undefined;
  const txt = fs.readFileSync(filePath, 'utf8');
  return JSON.parse(txt);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
