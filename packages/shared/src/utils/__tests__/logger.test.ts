import { describe, it, expect } from 'vitest';

import { createLogger, type LogSink } from '../logger.js';

function memorySink(): LogSink & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: line => out.push(line),
    stderr: line => err.push(line),
  };
}

describe('createLogger', () => {
  it('should write structured lines with the namespace', () => {
    const sink = memorySink();
    createLogger('cli', { level: 'debug', sink }).info('Run ingested', { runId: 'r1' });

    expect(sink.out).toHaveLength(1);
    expect(JSON.parse(sink.out[0] ?? '')).toMatchObject({
      level: 'INFO',
      namespace: 'cli',
      message: 'Run ingested',
      runId: 'r1',
    });
  });

  it('should drop messages below the configured level', () => {
    const sink = memorySink();
    const logger = createLogger('cli', { level: 'warn', sink });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(sink.out).toEqual([]);
    expect(sink.err).toHaveLength(1);
  });

  it('should write nothing when silent', () => {
    const sink = memorySink();
    createLogger('cli', { level: 'silent', sink }).error('hidden', new Error('boom'));

    expect(sink.err).toEqual([]);
  });

  it('should serialize errors and nest child namespaces', () => {
    const sink = memorySink();
    createLogger('cli', { level: 'error', sink }).child('ingest').error('Ingestion failed', new Error('boom'));

    expect(JSON.parse(sink.err[0] ?? '')).toMatchObject({
      namespace: 'cli:ingest',
      error: { name: 'Error', message: 'boom' },
    });
  });
});
