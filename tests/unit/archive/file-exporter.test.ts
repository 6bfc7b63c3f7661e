import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  FileArchiveExporter,
  buildArchiveDocument,
  buildArchiveKey,
} from '../../../src/lib/archive/file-exporter.js';
import type { BatchArchive } from '../../../src/lib/pipeline/types.js';
import { ExportError } from '../../../src/utils/errors.js';

const archive: BatchArchive = {
  batch: {
    batchId: 'b-42',
    timestamp: '2025-03-04T05:06:07.000Z',
    nodes: [{ node_name: 'r1', batch_id: 'b-42', timestamp: '2025-03-04T05:06:07.000Z' }],
    interfaces: [],
    addresses: [],
  },
  payload: [{ path: 'telemetry.node.system', entries: [{ keys: { node_name: 'r1' } }] }],
};

describe('buildArchiveKey', () => {
  it('should partition by UTC hour', () => {
    expect(buildArchiveKey('b-42', '2025-03-04T05:06:07.000Z')).toBe(
      'processed/2025/03/04/05/b-42.json',
    );
  });

  it('should convert offsets to UTC', () => {
    expect(buildArchiveKey('b-1', '2025-12-31T23:30:00-02:00')).toBe(
      'processed/2026/01/01/01/b-1.json',
    );
  });

  it('should reject an unparseable timestamp', () => {
    expect(() => buildArchiveKey('b-1', 'yesterday')).toThrow(ExportError);
  });
});

describe('buildArchiveDocument', () => {
  it('should carry the raw payload in raw mode', () => {
    expect(buildArchiveDocument(archive, 'raw')).toEqual({
      batch_id: 'b-42',
      timestamp: '2025-03-04T05:06:07.000Z',
      mode: 'raw',
      payload: archive.payload,
    });
  });

  it('should carry the three lists in normalized mode', () => {
    expect(buildArchiveDocument(archive, 'normalized')).toEqual({
      batch_id: 'b-42',
      timestamp: '2025-03-04T05:06:07.000Z',
      mode: 'normalized',
      nodes: archive.batch.nodes,
      interfaces: [],
      addresses: [],
    });
  });
});

describe('FileArchiveExporter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'archive-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write the batch under its key and return the path', async () => {
    const exporter = new FileArchiveExporter(dir, 'normalized');

    const target = await exporter.export(archive);

    expect(target).toBe(join(dir, 'processed', '2025', '03', '04', '05', 'b-42.json'));
    const document = JSON.parse(await readFile(target, 'utf8'));
    expect(document.mode).toBe('normalized');
    expect(document.nodes).toEqual(archive.batch.nodes);
  });

  it('should wrap write failures in an ExportError', async () => {
    const blocker = join(dir, 'blocker');
    await writeFile(blocker, 'not a directory');
    const exporter = new FileArchiveExporter(blocker);

    await expect(exporter.export(archive)).rejects.toBeInstanceOf(ExportError);
  });
});
