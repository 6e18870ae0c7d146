import {
  extractCoordinatesFromProse,
  parseVisionReply,
} from './vision-reply.parser';

const bounds = { width: 720, height: 1600 };

describe('parseVisionReply', () => {
  it('reads a fenced JSON reply and scales the confidence', () => {
    const reply = [
      '```json',
      '{"found": true, "x": 312, "y": 880, "confidence": 85, "description": "red car thumbnail"}',
      '```',
    ].join('\n');

    expect(parseVisionReply(reply, 'red car', bounds)).toEqual({
      description: 'red car thumbnail',
      coordinates: { x: 312, y: 880 },
      confidence: 0.85,
    });
  });

  it('defaults the confidence to one half', () => {
    expect(
      parseVisionReply('{"found": true, "x": "40px", "y": 60.6}', 'menu', bounds),
    ).toEqual({
      description: 'menu',
      coordinates: { x: 40, y: 61 },
      confidence: 0.5,
    });
  });

  it('reports a miss with zero confidence when the model did not find it', () => {
    expect(
      parseVisionReply('{"found": false, "confidence": 90}', 'cart', bounds),
    ).toEqual({ description: 'Could not find: cart', confidence: 0 });
  });

  it('omits coordinates when a found reply carries none', () => {
    expect(
      parseVisionReply('{"found": "yes", "confidence": 70}', 'cart', bounds),
    ).toEqual({ description: 'cart', confidence: 0.7 });
  });

  it('falls back to coordinates written in prose', () => {
    expect(
      parseVisionReply(
        'The button is at coordinates (120, 455) near the top.',
        'share',
        bounds,
      ),
    ).toEqual({
      description: 'share',
      coordinates: { x: 120, y: 455 },
      confidence: 0.6,
    });
  });

  it('keeps the raw text at low confidence when nothing can be read', () => {
    expect(parseVisionReply('  I cannot see it.  ', 'share', bounds)).toEqual({
      description: 'I cannot see it.',
      confidence: 0.3,
    });
  });
});

describe('extractCoordinatesFromProse', () => {
  it('skips pairs outside the image and tries the next pattern', () => {
    expect(
      extractCoordinatesFromProse('position 900, 40 or x: 100, y: 200', bounds),
    ).toEqual({ x: 100, y: 200 });
  });

  it('returns null when no pair is present', () => {
    expect(extractCoordinatesFromProse('nothing here', bounds)).toBeNull();
  });
});
