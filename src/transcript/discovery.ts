import fs from 'node:fs';
import path from 'node:path';

import { warn } from '../utils.js';

export const DEFAULT_TRANSCRIPT_EXTENSION = '.md';

export interface TranscriptFile {
  name: string;
  path: string;
}

export class TranscriptNotFoundError extends Error {
  public readonly transcript: string;

  public readonly path: string;

  constructor(transcript: string, filePath: string) {
    super(`transcript not found: ${transcript} (${filePath})`);
    this.transcript = transcript;
    this.path = filePath;
    this.name = 'TranscriptNotFoundError';
  }
}

export function transcriptNameFromPath(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

export function transcriptPath(dir: string, name: string, ext = DEFAULT_TRANSCRIPT_EXTENSION): string {
  return path.join(dir, `${name}${ext}`);
}

/** Every transcript in `dir`, ordered by name. A missing directory yields none. */
export function discoverTranscripts(dir: string, ext = DEFAULT_TRANSCRIPT_EXTENSION): TranscriptFile[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    warn(`cannot list transcripts in ${dir}: ${message}`);
    return [];
  }
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(ext))
    .map((entry) => {
      const filePath = path.join(dir, entry.name);
      return { name: entry.name.slice(0, entry.name.length - ext.length), path: filePath };
    })
    .sort((a, b) => (a.name < b.name ? -1 : (a.name > b.name ? 1 : 0)));
}

export function resolveTranscript(dir: string, name: string, ext = DEFAULT_TRANSCRIPT_EXTENSION): TranscriptFile {
  return { name, path: transcriptPath(dir, name, ext) };
}

export function readTranscriptText(file: TranscriptFile): string {
  try {
    return fs.readFileSync(file.path, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) throw new TranscriptNotFoundError(file.name, file.path);
    throw error;
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error
    && (error.code === 'ENOENT' || error.code === 'ENOTDIR' || error.code === 'EISDIR');
}
