import { describe, it, expect } from 'vitest';
import { detectMarkers } from './markers.js';

describe('detectMarkers', () => {
  it('finds a model stating that it is an AI', () => {
    expect(detectMarkers('As an AI language model, I have no opinions.')).toEqual(['ai_disclosure']);
  });

  it('finds refusals', () => {
    expect(detectMarkers('Sorry, I cannot help with that.')).toEqual(['ai_disclosure']);
    expect(detectMarkers('I can’t share that.')).toEqual(['ai_disclosure']);
  });

  it('reads encoded response bodies', () => {
    expect(detectMarkers(Buffer.from('I am not able to browse the web.'))).toEqual(['ai_disclosure']);
  });

  it('does not match inside longer words', () => {
    expect(detectMarkers('She works as an aide at the clinic.')).toEqual([]);
  });

  it('is empty for ordinary answers and undecodable input', () => {
    expect(detectMarkers('The capital of Norway is Oslo.')).toEqual([]);
    expect(detectMarkers(42)).toEqual([]);
  });
});
