import { describe, it, expect } from 'vitest';
import { TranscriptParseError } from '../src/pipeline/errors';
import { cleanCueText, formatTimestamp, formatVtt, parseTimestamp, parseVtt } from '../src/pipeline/vtt';

describe('parseTimestamp', () => {
  it('reads hours, minutes, seconds and millis', () => {
    expect(parseTimestamp('01:02:03.500')).toBe(3723.5);
  });

  it('accepts the short MM:SS.mmm form', () => {
    expect(parseTimestamp('01:05.000')).toBe(65);
  });

  it('rejects malformed values', () => {
    expect(parseTimestamp('1:5')).toBeNull();
    expect(parseTimestamp('00:61:00.000')).toBeNull();
    expect(parseTimestamp('abc')).toBeNull();
  });
});

describe('formatTimestamp', () => {
  it('pads every field', () => {
    expect(formatTimestamp(65)).toBe('00:01:05.000');
    expect(formatTimestamp(3723.25)).toBe('01:02:03.250');
  });
});

describe('cleanCueText', () => {
  it('strips inline tags and karaoke timings', () => {
    expect(cleanCueText('<00:00:01.000><c>hello</c> <i>world</i>')).toBe('hello world');
  });

  it('decodes common entities and collapses whitespace', () => {
    expect(cleanCueText('rock &amp; roll\n  &lt;live&gt;')).toBe('rock & roll <live>');
  });
});

describe('parseVtt', () => {
  it('parses cues with identifiers, notes and multi-line text', () => {
    const content = [
      'WEBVTT',
      'Kind: captions',
      'Language: el',
      '',
      'NOTE generated',
      '',
      '1',
      '00:00:10.000 --> 00:00:12.000 align:start position:0%',
      'hello',
      'world',
      '',
      '00:01:05.000 --> 00:01:07.500',
      'second cue',
      '',
    ].join('\n');
    expect(parseVtt(content)).toEqual([
      { startSec: 10, endSec: 12, timestamp: '00:00:10.000', text: 'hello world' },
      { startSec: 65, endSec: 67.5, timestamp: '00:01:05.000', text: 'second cue' },
    ]);
  });

  it('tolerates a byte order mark and CRLF line endings', () => {
    const cues = parseVtt('\uFEFFWEBVTT\r\n\r\n00:00:01.000 --> 00:00:02.000\r\nhi there\r\n');
    expect(cues).toHaveLength(1);
    expect(cues[0].text).toBe('hi there');
  });

  it('keeps whitespace-only lines inside auto-generated caption cues', () => {
    const content = [
      'WEBVTT',
      'Kind: captions',
      'Language: en',
      '',
      '00:00:00.030 --> 00:00:02.750 align:start position:0%',
      ' ',
      'hello<00:00:00.480><c> world</c>',
      '',
      '00:00:02.750 --> 00:00:02.760 align:start position:0%',
      'hello world',
      ' ',
      '',
      '00:00:02.760 --> 00:00:05.000 align:start position:0%',
      'hello world',
      ' ',
      'again<00:00:03.100><c> here</c>',
      '',
    ].join('\n');
    expect(parseVtt(content, 'auto.vtt').map((c) => [c.timestamp, c.text])).toEqual([
      ['00:00:00.030', 'hello world'],
      ['00:00:02.750', 'hello world'],
      ['00:00:02.760', 'hello world again here'],
    ]);
  });

  it('rejects a file without the header', () => {
    expect(() => parseVtt('00:00:01.000 --> 00:00:02.000\nhi', 'a.vtt')).toThrow(TranscriptParseError);
  });

  it('reports the line of malformed timings', () => {
    const content = 'WEBVTT\n\n00:00:xx --> 00:00:02.000\nhi\n';
    try {
      parseVtt(content, 'bad.vtt');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(TranscriptParseError);
      if (e instanceof TranscriptParseError) {
        expect(e.file).toBe('bad.vtt');
        expect(e.line).toBe(3);
      }
    }
  });

  it('rejects a block with no timings', () => {
    expect(() => parseVtt('WEBVTT\n\njust text\n')).toThrow('expected cue timings');
  });
});

describe('formatVtt', () => {
  it('writes a file parseVtt reads back', () => {
    const out = formatVtt([{ startSec: 1.5, endSec: 3, text: ' spaced   text ' }]);
    expect(out).toBe('WEBVTT\n\n00:00:01.500 --> 00:00:03.000\nspaced text\n\n');
    expect(parseVtt(out)[0]).toEqual({ startSec: 1.5, endSec: 3, timestamp: '00:00:01.500', text: 'spaced text' });
  });
});
