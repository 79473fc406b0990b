#!/usr/bin/env tsx
/**
 * Pushes every .md/.txt/.pdf/.docx file of a directory to the document API.
 * Usage: npm run knowledge:ingest -- [directory] [file ...]
 */

import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

['.env.local', '.env']
  .map((file) => path.resolve(process.cwd(), file))
  .forEach((envPath) => {
    loadEnv({ path: envPath, override: false });
  });

const DEFAULT_DIR = path.resolve(__dirname, '../tmp/knowledge');
const API_BASE_URL = process.env.API_BASE_URL || 'http://localhost:3000/api/v1';
const TEXT_EXTENSIONS = new Set(['.md', '.markdown', '.txt']);
const BINARY_MIME_TYPES: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.docx':
    'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
};

function isIngestible(filename: string): boolean {
  const extension = path.extname(filename).toLowerCase();
  return TEXT_EXTENSIONS.has(extension) || extension in BINARY_MIME_TYPES;
}

const ingestResponseSchema = z.object({
  data: z.object({
    status: z.enum(['indexed', 'unchanged']),
    document: z.object({ id: z.string(), version: z.number() }),
    chunkCount: z.number(),
  }),
});

/** Uses the first markdown heading when there is one, else the file name. */
function extractTitle(filename: string, content: string): string {
  const firstLine = content.split('\n')[0]?.trim();
  if (firstLine?.startsWith('# ')) {
    return firstLine.replace(/^#\s+/, '');
  }
  return path
    .basename(filename, path.extname(filename))
    .replace(/[-_]/g, ' ')
    .trim();
}

async function buildPayload(
  directory: string,
  filename: string,
): Promise<Record<string, string> | undefined> {
  const filePath = path.join(directory, filename);
  const mimeType = BINARY_MIME_TYPES[path.extname(filename).toLowerCase()];
  if (mimeType !== undefined) {
    const bytes = await readFile(filePath);
    return {
      sourceType: 'upload',
      sourceKey: filename,
      displayName: extractTitle(filename, ''),
      contentBase64: bytes.toString('base64'),
      mimeType,
    };
  }

  const content = await readFile(filePath, 'utf-8');
  if (!content.trim()) {
    return undefined;
  }
  return {
    sourceType: 'upload',
    sourceKey: filename,
    displayName: extractTitle(filename, content),
    text: content,
  };
}

async function ingestFile(directory: string, filename: string): Promise<void> {
  const payload = await buildPayload(directory, filename);
  if (!payload) {
    console.warn(`Skipping ${filename}: empty file`);
    return;
  }

  const response = await fetch(`${API_BASE_URL}/knowledge/documents`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(payload),
  });

  if (!response.ok) {
    const errorText = await response.text();
    throw new Error(
      `HTTP ${response.status}: ${errorText || response.statusText}`,
    );
  }

  const { data } = ingestResponseSchema.parse(await response.json());
  console.log(
    `${data.status === 'indexed' ? 'Indexed' : 'Unchanged'} ${filename}: ${data.document.id} v${data.document.version}, ${data.chunkCount} chunks`,
  );
}

async function main() {
  const args = process.argv.slice(2);
  const [first, ...rest] = args;
  const directory = first ? path.resolve(process.cwd(), first) : DEFAULT_DIR;

  const files = rest.length
    ? rest
    : (await readdir(directory)).filter(isIngestible);

  if (files.length === 0) {
    console.error(`No ingestible files found in ${directory}`);
    process.exit(1);
  }

  console.log(`Ingesting ${files.length} files from ${directory}\n`);

  let successCount = 0;
  let failCount = 0;
  for (const file of files) {
    try {
      await ingestFile(directory, file);
      successCount++;
    } catch (error) {
      failCount++;
      console.error(`Failed to ingest ${file}:`, error);
    }
  }

  console.log(`\nDone: ${successCount} succeeded, ${failCount} failed`);
  if (failCount > 0) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
