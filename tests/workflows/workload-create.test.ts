import { readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import type { TransportRequest } from '../../src/http/transport';
import { resolveWorkloadFiles, runWorkloadCreate } from '../../src/workflows/workload-create';
import { apiVersionFor, buildWorkloadTemplate, cleanWorkloadDefinition } from '../../src/workflows/workload-definition';
import { createTestContext } from '../support/context';
import { FakeTransport } from '../support/fake-transport';

function formParts(request: TransportRequest | undefined): { data: unknown; files: string[] } {
  const body = request?.body;
  if (!(body instanceof FormData)) {
    throw new Error('expected a multipart body');
  }
  const data = body.get('data');
  return {
    data: typeof data === 'string' ? JSON.parse(data) : undefined,
    files: body.getAll('files').map((entry) => (typeof entry === 'string' ? entry : entry.name))
  };
}

describe('workload definitions', () => {
  it('builds a docker template with networks inside the workload properties', () => {
    const template = buildWorkloadTemplate('docker');

    expect(template).toMatchObject({ name: 'test_workload', type: 'docker' });
    expect(template.versions).toEqual([
      expect.objectContaining({
        files: [{ originalName: 'nginx.tar.gz' }],
        workloadProperties: expect.objectContaining({ container_name: 'test_workload', networks: ['bridge'] })
      })
    ]);
  });

  it('builds a docker-compose template with service specific properties', () => {
    const template = buildWorkloadTemplate('docker-compose');

    expect(template.type).toBe('docker-compose');
    expect(template.versions).toEqual([
      expect.objectContaining({
        files: [],
        workloadSpecificProperties: {},
        remoteConnections: [expect.objectContaining({ serviceName: 'docker-compose-service' })]
      })
    ]);
  });

  it('marks registry workloads as docker with an image path', () => {
    const template = buildWorkloadTemplate('registry');

    expect(template.type).toBe('docker');
    expect(template.versions).toEqual([
      expect.objectContaining({
        files: [],
        workloadProperties: expect.objectContaining({ docker_file_option: 'path' })
      })
    ]);
  });

  it('drops server-side keys at every depth', () => {
    const cleaned = cleanWorkloadDefinition({
      _id: 'wl-1',
      name: 'app',
      createdAt: '2026-01-01',
      versions: [{ _id: 'v-1', name: 'v1', hash: 'abc', files: [{ originalName: 'a.tar', overall_size: 10 }] }, 'raw'],
      workloadProperties: { isDeployable: true, limit_CPUs: 100 }
    });

    expect(cleaned).toEqual({
      name: 'app',
      versions: [{ name: 'v1', files: [{ originalName: 'a.tar' }] }, 'raw'],
      workloadProperties: { limit_CPUs: 100 }
    });
  });

  it('selects API v3 only for docker-compose', () => {
    expect(apiVersionFor({ type: 'docker-compose' })).toBe(3);
    expect(apiVersionFor({ type: 'vm' })).toBe(2);
    expect(apiVersionFor({})).toBe(2);
  });
});

describe('workload create', () => {
  it('writes the requested template', async () => {
    const context = createTestContext();

    const result = await runWorkloadCreate(context, {
      file: 'wl_def.json',
      action: { kind: 'template', template: 'vm' }
    });

    expect(result.written).toBe(path.join(context.workDir, 'wl_def.json'));
    const written: unknown = JSON.parse(readFileSync(path.join(context.workDir, 'wl_def.json'), 'utf8'));
    expect(written).toMatchObject({ name: 'test_workload', type: 'vm' });
  });

  it('resolves comma separated globs against the work directory', async () => {
    const { workDir } = createTestContext();
    for (const name of ['b.tar.gz', 'a.tar.gz', 'notes.txt', 'app.yml']) {
      writeFileSync(path.join(workDir, name), name);
    }

    const files = await resolveWorkloadFiles(workDir, '*.tar.gz, app.yml');

    expect(files).toEqual([
      path.join(workDir, 'a.tar.gz'),
      path.join(workDir, 'app.yml'),
      path.join(workDir, 'b.tar.gz')
    ]);
    expect(await resolveWorkloadFiles(workDir, undefined)).toEqual([]);
  });

  it('provisions every definition in the file and skips non-objects', async () => {
    const transport = new FakeTransport()
      .on('POST', '/nerve/v2/workloads', { data: { _id: 'wl-new' } })
      .on('POST', '/nerve/v3/workloads', { data: { _id: 'wl-compose' } });
    const context = createTestContext(transport);
    writeFileSync(path.join(context.workDir, 'app.tar.gz'), 'image');
    writeFileSync(path.join(context.workDir, 'notes.txt'), 'ignored');
    writeFileSync(
      path.join(context.workDir, 'wl_def.json'),
      JSON.stringify([
        { _id: 'wl-old', name: 'app', type: 'docker', versions: [{ _id: 'v-old', name: 'v1', hash: 'h' }] },
        'not a workload',
        { name: 'compose', type: 'docker-compose' }
      ])
    );

    const result = await runWorkloadCreate(context, {
      file: 'wl_def.json',
      action: { kind: 'create' },
      path: '*.tar.gz'
    });

    expect(result).toEqual({ provisioned: ['app', 'compose'], skipped: [1] });
    expect(formParts(transport.calls('POST', '/nerve/v2/workloads')[0])).toEqual({
      data: { name: 'app', type: 'docker', versions: [{ name: 'v1' }] },
      files: ['app.tar.gz']
    });
    expect(formParts(transport.calls('POST', '/nerve/v3/workloads')[0]).data).toEqual({
      name: 'compose',
      type: 'docker-compose'
    });
    expect(context.lines()).toContain(
      'Workload creation failed for element 1: Workload definition must be an object'
    );
  });

  it('accepts a single definition object', async () => {
    const transport = new FakeTransport().on('POST', '/nerve/v2/workloads', { data: {} });
    const context = createTestContext(transport);
    writeFileSync(path.join(context.workDir, 'wl_def.json'), JSON.stringify({ name: 'single', type: 'codesys' }));

    const result = await runWorkloadCreate(context, { file: 'wl_def.json', action: { kind: 'create' } });

    expect(result.provisioned).toEqual(['single']);
    expect(formParts(transport.calls('POST', '/nerve/v2/workloads')[0]).files).toEqual([]);
  });

  it('fails when the definition file is missing', async () => {
    const context = createTestContext();

    await expect(runWorkloadCreate(context, { file: 'wl_def.json', action: { kind: 'create' } })).rejects.toThrow(
      "Workload definition file 'wl_def.json' does not exist"
    );
  });
});
