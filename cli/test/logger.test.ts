import test from 'node:test';
import assert from 'node:assert/strict';

import { levelFromFlags, Logger, setLogLevel, setLogSink } from '../lib/logger.js';

function capture(run: () => void): string[] {
  const lines: string[] = [];
  const previous = setLogSink((line) => lines.push(line));
  try {
    run();
  } finally {
    setLogSink(previous);
    setLogLevel('warn');
  }
  return lines;
}

test('levelFromFlags: debug beats verbose, default is warn', () => {
  assert.equal(levelFromFlags({ verbose: false, debug: false }), 'warn');
  assert.equal(levelFromFlags({ verbose: true, debug: false }), 'info');
  assert.equal(levelFromFlags({ verbose: true, debug: true }), 'debug');
});

test('messages below the threshold are dropped', () => {
  const log = Logger.scope('batch');
  const lines = capture(() => {
    setLogLevel('info');
    log.debug('hidden');
    log.info('wave 1: sending 2 request(s)');
    log.error('boom');
  });

  assert.deepEqual(lines, ['[BATCH:INFO] wave 1: sending 2 request(s)', '[BATCH:ERROR] boom']);
});

test('extra values are appended, errors by name and message', () => {
  const log = Logger.scope('main');
  const lines = capture(() => {
    log.warn('skipped', { id: 5 }, new RangeError('too many ids'));
  });

  assert.deepEqual(lines, ['[MAIN:WARN] skipped {"id":5} RangeError: too many ids']);
});
