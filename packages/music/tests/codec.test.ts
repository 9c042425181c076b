import { describe, expect, it } from 'vitest';
import { decodeMessage, encodeCommand } from '../src/codec.js';

const trackPayload = {
  encoded: 'encoded-a',
  info: {
    identifier: 'a',
    title: 'Track A',
    author: 'Test Artist',
    length: 180000,
    isStream: false,
    uri: 'https://media.test/a',
  },
};

describe('encodeCommand', () => {
  it('writes one JSON object and leaves out unset optional fields', () => {
    expect(encodeCommand({ op: 'play', guildId: 'guild-1', track: 'encoded-a', startTimeMs: undefined })).toBe(
      '{"op":"play","guildId":"guild-1","track":"encoded-a"}',
    );
    expect(encodeCommand({ op: 'pause', guildId: 'guild-1', state: true })).toBe(
      '{"op":"pause","guildId":"guild-1","state":true}',
    );
  });
});

describe('decodeMessage', () => {
  it('decodes the ready handshake', () => {
    expect(decodeMessage('{"op":"ready","resumed":true,"sessionId":"abc"}')).toEqual({
      ok: true,
      message: { op: 'ready', sessionId: 'abc', resumed: true },
    });
  });

  it('decodes player updates from either position spelling and ignores extra fields', () => {
    const result = decodeMessage(
      JSON.stringify({
        op: 'playerUpdate',
        guildId: 'guild-1',
        state: { position: 1500, time: 99, connected: true, ping: 12 },
        futureField: 'ignored',
      }),
    );

    expect(result).toEqual({
      ok: true,
      message: { op: 'playerUpdate', guildId: 'guild-1', state: { positionMs: 1500, timestamp: 99, connected: true } },
    });
  });

  it('decodes stats from a buffer frame', () => {
    const frame = Buffer.from(
      JSON.stringify({
        op: 'stats',
        players: 3,
        playingPlayers: 2,
        uptime: 1000,
        memory: { free: 1, used: 2, allocated: 3, reservable: 4 },
        cpu: { cores: 4, systemLoad: 0.5, lavalinkLoad: 0.25 },
      }),
    );

    const result = decodeMessage(frame);

    expect(result.ok && result.message.op === 'stats' ? result.message.stats.cpu.lavalinkLoad : null).toBe(0.25);
    expect(result.ok && result.message.op === 'stats' ? result.message.stats.frameStats : 'missing').toBeNull();
  });

  it('normalises track end reasons in both spellings', () => {
    const upper = decodeMessage(
      JSON.stringify({ op: 'event', type: 'TrackEndEvent', guildId: 'guild-1', track: trackPayload, reason: 'LOAD_FAILED' }),
    );
    const lower = decodeMessage(
      JSON.stringify({ op: 'event', type: 'TrackEndEvent', guildId: 'guild-1', track: 'encoded-a', reason: 'finished' }),
    );

    expect(upper).toEqual({
      ok: true,
      message: { op: 'event', guildId: 'guild-1', event: { type: 'trackEnd', encodedTrack: 'encoded-a', reason: 'loadFailed' } },
    });
    expect(lower).toEqual({
      ok: true,
      message: { op: 'event', guildId: 'guild-1', event: { type: 'trackEnd', encodedTrack: 'encoded-a', reason: 'finished' } },
    });
  });

  it('decodes exceptions, stuck tracks and closed voice connections', () => {
    const exception = decodeMessage(
      JSON.stringify({
        op: 'event',
        type: 'TrackExceptionEvent',
        guildId: 'guild-1',
        track: 'encoded-a',
        exception: { message: 'Broken stream', severity: 'SUSPICIOUS', cause: 'EOF' },
      }),
    );
    const stuck = decodeMessage(
      JSON.stringify({ op: 'event', type: 'TrackStuckEvent', guildId: 'guild-1', track: 'encoded-a', thresholdMs: 10000 }),
    );
    const closed = decodeMessage(
      JSON.stringify({ op: 'event', type: 'WebSocketClosedEvent', guildId: 'guild-1', code: 4006, reason: 'Session invalid', byRemote: true }),
    );

    expect(exception).toEqual({
      ok: true,
      message: {
        op: 'event',
        guildId: 'guild-1',
        event: { type: 'trackException', encodedTrack: 'encoded-a', message: 'Broken stream', severity: 'suspicious', cause: 'EOF' },
      },
    });
    expect(stuck).toEqual({
      ok: true,
      message: { op: 'event', guildId: 'guild-1', event: { type: 'trackStuck', encodedTrack: 'encoded-a', thresholdMs: 10000 } },
    });
    expect(closed).toEqual({
      ok: true,
      message: {
        op: 'event',
        guildId: 'guild-1',
        event: { type: 'connectionClosed', code: 4006, reason: 'Session invalid', byRemote: true },
      },
    });
  });

  it('maps unknown ops and event types to unknown variants', () => {
    expect(decodeMessage('{"op":"lyrics","guildId":"guild-1"}')).toEqual({ ok: true, message: { op: 'unknown', rawOp: 'lyrics' } });
    expect(decodeMessage('{"op":"event","type":"SegmentSkipped","guildId":"guild-1"}')).toEqual({
      ok: true,
      message: { op: 'event', guildId: 'guild-1', event: { type: 'unknown', rawType: 'SegmentSkipped' } },
    });
  });

  it('reports malformed frames instead of throwing', () => {
    const notJson = decodeMessage('{"op":');
    const noOp = decodeMessage('{"guildId":"guild-1"}');
    const badType = decodeMessage('{"op":"event","type":"TrackStuckEvent","guildId":"guild-1","track":"encoded-a","thresholdMs":"soon"}');
    const badReason = decodeMessage('{"op":"event","type":"TrackEndEvent","guildId":"guild-1","track":"encoded-a","reason":"exploded"}');

    for (const result of [notJson, noOp, badType, badReason]) {
      expect(result.ok).toBe(false);
    }
    expect(notJson.ok ? null : notJson.error.message).toBe('Frame is not valid JSON');
    expect(noOp.ok ? null : noOp.error.kind).toBe('malformed');
    expect(badType.ok ? [] : badType.error.issues).toEqual(['thresholdMs: Expected number, received string']);
    expect(badReason.ok ? null : badReason.error.message).toBe('Malformed TrackEndEvent frame');
  });
});
