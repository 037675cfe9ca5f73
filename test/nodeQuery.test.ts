import { describe, expect, it } from 'vitest';

import { TransientQueryFailure } from '../src/errors.js';
import { RemoteNodeQuery, normaliseNodeState, parseNodeListing } from '../src/sources/nodeQuery.js';
import { exited, scriptedRunner } from './helpers.js';

describe('normaliseNodeState', () => {
  it.each([
    ['idle', 'idle'],
    ['IDLE*', 'idle'],
    ['idle~', 'idle'],
    ['allocated', 'allocated'],
    ['allocated+', 'allocated'],
    ['completing', 'allocated'],
    ['mixed', 'mixed'],
    ['mixed-', 'mixed'],
    ['down*', 'down'],
    ['drained', 'down'],
    ['draining', 'down'],
    ['fail', 'down'],
    ['maint', 'down'],
    ['powered_down', 'down'],
    ['future', 'unknown'],
    ['', 'unknown']
  ])('maps %s to %s', (raw, token) => {
    expect(normaliseNodeState(raw)).toBe(token);
  });
});

describe('parseNodeListing', () => {
  it('parses node and state columns, lowercasing node ids', () => {
    expect(parseNodeListing('C1 allocated\nc2   idle\n')).toEqual([
      { nodeId: 'c1', state: 'allocated' },
      { nodeId: 'c2', state: 'idle' }
    ]);
  });

  it('returns nothing for an empty listing', () => {
    expect(parseNodeListing('\n')).toEqual([]);
  });

  it('rejects a row without a state', () => {
    expect(() => parseNodeListing('c1 idle\nc2')).toThrow(TransientQueryFailure);
  });
});

describe('RemoteNodeQuery', () => {
  const options = {
    host: '10.0.0.5',
    user: 'monitor',
    container: 'login',
    dockerCommand: 'docker',
    connectTimeoutSec: 5,
    timeoutMs: 10_000
  };

  it('reaches sinfo through batch-mode ssh', () => {
    expect(new RemoteNodeQuery(options).buildCommand()).toEqual({
      command: 'ssh',
      args: [
        '-o',
        'BatchMode=yes',
        '-o',
        'ConnectTimeout=5',
        '-o',
        'StrictHostKeyChecking=no',
        '-o',
        'UserKnownHostsFile=/dev/null',
        '-o',
        'LogLevel=ERROR',
        'monitor@10.0.0.5',
        "docker exec login sinfo -N -h -o '%N %T'"
      ]
    });
  });

  it('returns normalised node states on success', async () => {
    const runner = scriptedRunner(exited('c1 mixed\nq1 down*\n'));
    await expect(new RemoteNodeQuery({ ...options, runner }).fetch()).resolves.toEqual({
      ok: true,
      value: [
        { nodeId: 'c1', state: 'mixed' },
        { nodeId: 'q1', state: 'down' }
      ]
    });
  });

  it('reports an ssh failure as an exit failure', async () => {
    const runner = scriptedRunner(exited('', 255, 'ssh: connect to host 10.0.0.5 port 22: No route to host'));
    await expect(new RemoteNodeQuery({ ...options, runner }).fetch()).resolves.toEqual({ ok: false, kind: 'exit' });
  });

  it('reports a hung connection as a timeout', async () => {
    const runner = scriptedRunner({ status: 'timeout', stdout: '', stderr: '' });
    await expect(new RemoteNodeQuery({ ...options, runner }).fetch()).resolves.toEqual({
      ok: false,
      kind: 'timeout'
    });
  });

  it('turns a throwing runner into a spawn failure', async () => {
    const query = new RemoteNodeQuery({
      ...options,
      runner: async () => {
        throw new Error('EAGAIN');
      }
    });
    await expect(query.fetch()).resolves.toEqual({ ok: false, kind: 'spawn' });
  });
});
