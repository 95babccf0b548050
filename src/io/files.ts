import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { getMaxOutputBytes } from '../config.js';
import { invalidParams, notFound } from '../shared/index.js';

export interface FileMetadata {
  path: string;
  size_bytes: number;
  mtime_iso: string;
  sha256: string;
}

function resolveExisting(filePath: string, label: string): { resolved: string; stat: fs.Stats } {
  if (!path.isAbsolute(filePath)) {
    throw invalidParams(`${label} must be an absolute path`, { value: filePath });
  }
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw notFound(`${label} does not exist: ${resolved}`, { value: resolved });
  }
  return { resolved, stat: fs.statSync(resolved) };
}

export function validateFilePath(filePath: string, label = 'path'): string {
  const { resolved, stat } = resolveExisting(filePath, label);
  if (!stat.isFile()) {
    throw invalidParams(`${label} must point to a file`, { value: resolved });
  }
  const maxBytes = getMaxOutputBytes();
  if (stat.size > maxBytes) {
    throw invalidParams(`${label} is larger than ${maxBytes} bytes`, {
      value: resolved,
      size_bytes: stat.size,
    });
  }
  return resolved;
}

export function validateDirectory(dirPath: string, label = 'directory'): string {
  const { resolved, stat } = resolveExisting(dirPath, label);
  if (!stat.isDirectory()) {
    throw invalidParams(`${label} must point to a directory`, { value: resolved });
  }
  return resolved;
}

/** Output text with CRLF and lone CR line endings folded to `\n`. */
export function normalizeNewlines(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

export function readOutputFile(filePath: string, label = 'path'): string {
  return normalizeNewlines(fs.readFileSync(validateFilePath(filePath, label), 'utf-8'));
}

export async function sha256File(filePath: string): Promise<string> {
  const hash = crypto.createHash('sha256');
  const stream = fs.createReadStream(filePath);
  for await (const chunk of stream) {
    hash.update(chunk as Buffer);
  }
  return hash.digest('hex');
}

export async function getFileMetadata(filePath: string): Promise<FileMetadata> {
  const resolved = validateFilePath(filePath);
  const stat = fs.statSync(resolved);
  return {
    path: resolved,
    size_bytes: stat.size,
    mtime_iso: stat.mtime.toISOString(),
    sha256: await sha256File(resolved),
  };
}
