/**
 * End-to-end run of the process pipeline over NDJSON files
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { runProcess } from '../../src/cli/commands/process.js';
import { loadPipelineConfig } from '../../src/utils/config-loader.js';
import { FileIOError } from '../../src/utils/errors.js';

const payloadA = [
  {
    path: 'telemetry.node.system',
    entries: [{ keys: { node_name: 'spine-1' }, fields: { vendor: 'nokia' } }],
  },
  [
    {
      path: 'telemetry.interface.statistics',
      entries: [
        { keys: { node_name: 'spine-1', interface_name: 'ethernet-1/1' }, fields: { in_octets: 10 } },
        { keys: { node_name: 'spine-1' } },
      ],
    },
  ],
];

const payloadB = {
  path: 'telemetry.interface.subinterface.ipv6.address',
  entries: [
    {
      keys: {
        node_name: 'spine-1',
        interface_name: 'ethernet-1/1',
        subinterface_index: '0',
        'address_ip-prefix': '2001:db8::1/64',
      },
    },
  ],
};

async function readLines(file: string): Promise<Array<Record<string, unknown>>> {
  const content = await readFile(file, 'utf8');
  return content
    .split('\n')
    .filter((line) => line !== '')
    .map((line) => JSON.parse(line));
}

describe('process pipeline', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pipeline-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write records, archives and alerts for an NDJSON input', async () => {
    const inputPath = join(dir, 'messages.ndjson');
    await writeFile(
      inputPath,
      [JSON.stringify(payloadA), '{not json', JSON.stringify(payloadB), ''].join('\n'),
    );
    const outputDir = join(dir, 'out');
    const archiveDir = join(dir, 'archive');
    const alertsFile = join(dir, 'alerts.ndjson');

    const config = loadPipelineConfig({
      cli: {
        inputPath,
        concurrency: 2,
        sink: { type: 'ndjson', dir: outputDir },
        archive: { enabled: true, dir: archiveDir, mode: 'normalized' },
        alerts: { file: alertsFile },
      },
    });

    const summary = await runProcess(config);

    expect(summary).toMatchObject({
      messages: 2,
      published: 2,
      extractionFailures: 0,
      sinkFailures: 0,
      records: { nodes: 1, interfaces: 1, addresses: 1 },
      aborted: false,
    });

    const nodes = await readLines(join(outputDir, 'node-data.ndjson'));
    const interfaces = await readLines(join(outputDir, 'interface-data.ndjson'));
    const addresses = await readLines(join(outputDir, 'address-data.ndjson'));

    expect(nodes).toHaveLength(1);
    expect(nodes[0]).toMatchObject({ node_name: 'spine-1', vendor: 'nokia' });
    expect(interfaces).toEqual([
      expect.objectContaining({ interface_name: 'ethernet-1/1', in_octets: 10, out_octets: 0 }),
    ]);
    expect(addresses).toEqual([
      expect.objectContaining({ address_ip_prefix: '2001:db8::1/64', subinterface_index: '0' }),
    ]);
    // Records of one message share its batch; different messages do not
    expect(nodes[0]?.batch_id).toBe(interfaces[0]?.batch_id);
    expect(addresses[0]?.batch_id).not.toBe(nodes[0]?.batch_id);

    const archived = (await readdir(archiveDir, { recursive: true })).filter((entry) =>
      entry.endsWith('.json'),
    );
    expect(archived).toHaveLength(2);

    const alerts = await readLines(alertsFile);
    expect(alerts).toHaveLength(1);
    expect(alerts[0]).toMatchObject({
      subject: 'Stream Processing Error in message-source',
      attributes: { component: 'message-source', error_type: 'InputReadError', batch_id: '' },
    });
  });

  it('should append to existing record files across runs', async () => {
    const inputPath = join(dir, 'messages.ndjson');
    await writeFile(inputPath, JSON.stringify(payloadB) + '\n');
    const config = loadPipelineConfig({
      cli: { inputPath, sink: { type: 'ndjson', dir: join(dir, 'out') } },
    });

    await runProcess(config);
    await runProcess(config);

    expect(await readLines(join(dir, 'out', 'address-data.ndjson'))).toHaveLength(2);
  });

  it('should fail fast on a missing input file', async () => {
    const config = loadPipelineConfig({
      cli: { inputPath: join(dir, 'missing.ndjson'), sink: { type: 'ndjson', dir: join(dir, 'out') } },
    });

    await expect(runProcess(config)).rejects.toBeInstanceOf(FileIOError);
  });
});
