import { EventEmitter } from 'events';
import fs from 'fs';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { buildServer } from '../src/api/index';
import { InMemoryContentRepository } from '../src/repositories/contentRepository';
import { resolveUrl } from './fixtures';

const { spawnMock } = vi.hoisted(() => ({ spawnMock: vi.fn() }));

vi.mock('child_process', () => ({ spawn: spawnMock }));

type App = Awaited<ReturnType<typeof buildServer>>;
let app: App | undefined;

class FakeChild extends EventEmitter {
  pid = 4242;
}

describe('POST /ingest', () => {
  afterEach(async () => {
    await app?.close();
    app = undefined;
    vi.restoreAllMocks();
    spawnMock.mockReset();
  });

  it('starts the ingest script and logs a failed start', async () => {
    const child = new FakeChild();
    spawnMock.mockReturnValue(child);
    app = await buildServer({ repository: new InMemoryContentRepository(), resolveUrl });
    const errorSpy = vi.spyOn(app.log, 'error');
    vi.spyOn(fs, 'existsSync').mockReturnValue(true);

    const res = await app.inject({
      method: 'POST',
      url: '/ingest',
      payload: { file: 'manual.pdf', extractImages: true }
    });
    expect(res.statusCode).toBe(202);
    expect(res.json()).toEqual({ message: 'Ingest started', file: 'manual.pdf', extractImages: true, pid: 4242 });
    expect(spawnMock.mock.calls[0][1]).toEqual([
      expect.stringContaining('ingestPdf.js'),
      'manual.pdf',
      '--extract-images'
    ]);

    const failure = new Error('spawn EACCES');
    child.emit('error', failure);
    expect(errorSpy).toHaveBeenCalledWith({ err: failure, file: 'manual.pdf' }, 'ingest job failed to start');
  });
});
