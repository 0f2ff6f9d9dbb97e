import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';

export const resolveGradingAssetPath = (relativePath: string): string => {
  const candidates = [
    resolve(__dirname, '..', relativePath),
    resolve(process.cwd(), 'src', 'grading', relativePath),
    resolve(process.cwd(), 'apps', 'backend', 'src', 'grading', relativePath),
  ];

  for (const candidate of candidates) {
    if (existsSync(candidate)) {
      return candidate;
    }
  }

  throw new Error(`Missing grading asset: ${relativePath}`);
};

export const readGradingJson = (relativePath: string): unknown =>
  JSON.parse(readFileSync(resolveGradingAssetPath(relativePath), 'utf-8'));
