/**
 * Tests for EventLoop
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { EventLoop } from '../EventLoop';
import type { CommandSink, EventLoopOptions, PollerControl } from '../EventLoop';
import { MemoryClipboard, NoopMediaControls } from '../../integration/MediaControls';
import type { Frame, FrameSink } from '../../render/frame';
import { createInitialState } from '../../state/AppState';
import type { ApiError } from '../../types/errors';
import { QueueFullError, TransientError } from '../../types/errors';
import type { Command } from '../../types/events';
import type { Result } from '../../types/result';
import { err, ok } from '../../types/result';
import type { AppState } from '../../types/state';
import { makeSnapshot, testConfig } from '../../__tests__/fixtures';

type ReauthResult = Result<void, ApiError>;

const NOW = 1_000_000;

async function settle(): Promise<void> {
  for (let i = 0; i < 10; i++) {
    await Promise.resolve();
  }
}

describe('EventLoop', () => {
  let frames: Frame[];
  let sink: FrameSink;
  let enqueue: Mock<CommandSink['enqueue']>;
  let clear: Mock<CommandSink['clear']>;
  let poller: { [K in keyof PollerControl]: Mock<PollerControl[K]> };
  let reauthenticate: Mock<() => Promise<ReauthResult>>;
  let logout: Mock<() => Promise<void>>;
  let mediaControls: NoopMediaControls;
  let clipboard: MemoryClipboard;

  function createLoop(overrides: Partial<EventLoopOptions> = {}): EventLoop {
    return new EventLoop({
      config: testConfig(),
      commands: { enqueue, clear },
      poller,
      reauthenticate,
      logout,
      sink,
      mediaControls,
      clipboard,
      now: () => NOW,
      ...overrides,
    });
  }

  function withPlayback(): AppState {
    return { ...createInitialState(), playback: makeSnapshot(), applied: { playback: 1 } };
  }

  beforeEach(() => {
    frames = [];
    sink = { draw: (frame) => frames.push(frame) };
    enqueue = vi.fn<CommandSink['enqueue']>(() => ok(undefined));
    clear = vi.fn<CommandSink['clear']>(() => 0);
    poller = {
      setView: vi.fn<PollerControl['setView']>(),
      pollNow: vi.fn<PollerControl['pollNow']>(),
      pause: vi.fn<PollerControl['pause']>(),
      resume: vi.fn<PollerControl['resume']>(),
    };
    reauthenticate = vi.fn<() => Promise<ReauthResult>>(async () => ok(undefined));
    logout = vi.fn<() => Promise<void>>(async () => {});
    mediaControls = new NoopMediaControls();
    clipboard = new MemoryClipboard();
  });

  it('should draw once per batch', () => {
    const loop = createLoop();

    loop.processBatch([
      { type: 'resize', columns: 100, rows: 30 },
      { type: 'resize', columns: 120, rows: 40 },
      { type: 'key_press', key: '/' },
    ]);

    expect(loop.frameCount).toBe(1);
    expect(frames).toHaveLength(1);
    expect(frames[0]?.prompt).toBe('');
    expect(loop.getState().size).toEqual({ columns: 120, rows: 40 });
  });

  it('should not draw when nothing changed', () => {
    const loop = createLoop();

    loop.processBatch([{ type: 'key_press', key: 'x' }]);

    expect(loop.frameCount).toBe(0);
  });

  it('should hand commands to the queue and drive the poller', () => {
    const loop = createLoop();

    loop.processBatch([{ type: 'started' }]);

    expect(enqueue.mock.calls.map(([command]) => command.request.operation)).toEqual([
      'getUser',
      'getPlaylists',
    ]);
    expect(poller.setView).toHaveBeenCalledWith('library');
    expect(poller.pollNow).toHaveBeenCalledTimes(1);
  });

  it('should report a command the queue refused as dropped', () => {
    enqueue.mockReturnValue(err(new QueueFullError('Command queue is full (1)', 1)));
    const loop = createLoop({ initialState: withPlayback() });

    loop.processBatch([{ type: 'key_press', key: ' ' }]);
    expect(loop.getState().pending['toggle-playback']).toBeDefined();

    const queued = loop.events.drain();
    expect(queued).toHaveLength(1);
    const dropped = queued[0];
    if (dropped?.type !== 'command_dropped') {
      return expect.unreachable('expected a command_dropped event');
    }
    expect(dropped.command.request).toEqual({ operation: 'play', params: {} });

    loop.processBatch(queued);
    expect(loop.getState().pending).toEqual({});
    expect(loop.getState().playback?.isPlaying).toBe(false);
  });

  it('should run one re-authentication at a time', async () => {
    let finish: (result: ReauthResult) => void = () => {};
    reauthenticate.mockImplementation(
      () =>
        new Promise<ReauthResult>((resolve) => {
          finish = resolve;
        })
    );
    const loop = createLoop();

    loop.processBatch([{ type: 'session_expired' }]);
    loop.processBatch([{ type: 'key_press', key: 'enter' }]);
    expect(reauthenticate).toHaveBeenCalledTimes(1);

    finish(ok(undefined));
    await settle();
    expect(loop.events.drain()).toEqual([{ type: 'reauthenticated' }]);

    loop.processBatch([{ type: 'key_press', key: 'enter' }]);
    expect(reauthenticate).toHaveBeenCalledTimes(2);
  });

  it('should report a failed re-authentication as an event', async () => {
    const error = new TransientError('offline');
    reauthenticate.mockResolvedValue(err(error));
    const loop = createLoop();

    loop.processBatch([{ type: 'session_expired' }]);
    await settle();

    expect(loop.events.drain()).toEqual([{ type: 'reauth_failed', error }]);
  });

  it('should clear the queue, pause polling and drop the session on logout', async () => {
    const loop = createLoop({ initialState: withPlayback() });

    loop.processBatch([{ type: 'key_press', key: 'X' }]);

    expect(clear).toHaveBeenCalledTimes(1);
    expect(poller.pause).toHaveBeenCalledTimes(1);
    expect(logout).toHaveBeenCalledTimes(1);
    expect(loop.getState().signedOut).toBe(true);
    expect(loop.getState().playback).toBeNull();
    expect(mediaControls.current).toBeNull();

    loop.processBatch([{ type: 'snapshot_updated', seq: 2, snapshot: makeSnapshot() }]);
    expect(loop.getState().playback).toBeNull();

    loop.processBatch([{ type: 'key_press', key: 'enter' }]);
    await settle();
    loop.processBatch(loop.events.drain());

    expect(loop.getState().signedOut).toBe(false);
    expect(loop.getState().view).toEqual({ kind: 'library' });
    expect(poller.resume).toHaveBeenCalledTimes(1);
    expect(enqueue.mock.calls.map(([command]) => command.request.operation)).toEqual([
      'getUser',
      'getPlaylists',
    ]);
  });

  it('should keep running when clearing the stored session fails', async () => {
    logout.mockRejectedValue(new Error('read-only file system'));
    const loop = createLoop({ initialState: withPlayback() });

    loop.processBatch([{ type: 'key_press', key: 'X' }]);
    await settle();

    expect(loop.getState().running).toBe(true);
    expect(loop.getState().signedOut).toBe(true);
  });

  it('should copy to the clipboard and publish metadata', async () => {
    const loop = createLoop({ initialState: withPlayback() });

    loop.processBatch([{ type: 'key_press', key: 'c' }]);
    await settle();
    expect(clipboard.text).toBe('https://open.example.com/track/t1');

    loop.processBatch([
      { type: 'snapshot_updated', seq: 2, snapshot: makeSnapshot({ isPlaying: true }) },
    ]);
    expect(mediaControls.current).toEqual({
      title: 'Track t1',
      artists: ['Test Artist'],
      album: 'Test Album',
      durationMs: 200_000,
      isPlaying: true,
    });
  });

  it('should keep running when the clipboard fails', async () => {
    const failing = {
      copy: vi.fn<(text: string) => Promise<void>>(async () => {
        throw new Error('no clipboard');
      }),
    };
    const loop = createLoop({ initialState: withPlayback(), clipboard: failing });

    loop.processBatch([{ type: 'key_press', key: 'c' }]);
    await settle();

    expect(failing.copy).toHaveBeenCalledWith('https://open.example.com/track/t1');
    expect(loop.getState().running).toBe(true);
  });

  it('should survive a sink that throws', () => {
    const loop = createLoop({
      sink: {
        draw: () => {
          throw new Error('terminal gone');
        },
      },
    });

    loop.processBatch([{ type: 'resize', columns: 90, rows: 20 }]);

    expect(loop.frameCount).toBe(0);
    expect(loop.getState().size).toEqual({ columns: 90, rows: 20 });
  });

  it('should stop processing a batch after quit', () => {
    const loop = createLoop();

    loop.processBatch([
      { type: 'key_press', key: 'q' },
      { type: 'resize', columns: 100, rows: 30 },
    ]);

    expect(loop.getState().running).toBe(false);
    expect(loop.getState().size).toEqual({ columns: 80, rows: 24 });
  });

  it('should run until quit and return the final state', async () => {
    const loop = createLoop();
    loop.dispatch({ type: 'key_press', key: 'q' });

    const state = await loop.run();

    expect(state.running).toBe(false);
    // Initial frame plus the batch with the quit
    expect(loop.frameCount).toBe(2);
  });

  it('should return when closed', async () => {
    const loop = createLoop();
    const running = loop.run();

    loop.close();
    const state = await running;

    expect(state.running).toBe(true);
    expect(loop.dispatch({ type: 'timer_tick' })).toBe(false);
  });

  it('should pass the command with its id to the queue', () => {
    const commands: Command[] = [];
    enqueue.mockImplementation((command) => {
      commands.push(command);
      return ok(undefined);
    });
    const loop = createLoop({ initialState: withPlayback() });

    loop.processBatch([{ type: 'key_press', key: 'n' }]);

    expect(commands).toEqual([
      {
        id: 1,
        request: { operation: 'next', params: {} },
        resource: 'playback',
        generation: null,
        op: null,
      },
    ]);
  });
});
