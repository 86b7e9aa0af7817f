/// <reference types="jest" />
import { computeFingerprint, digestPayload, sha256, shortHash, stableStringify } from '../src/utils/fingerprint';
import { stageFingerprint, effectiveParameters } from '../src/services/stageFingerprints';
import { resolveParameters } from '../src/services/pipelineCoordinator';

describe('stableStringify', () => {
  it('sorts object keys at every level', () => {
    expect(stableStringify({ b: 1, a: { d: [2, 1], c: 'x' } })).toBe('{"a":{"c":"x","d":[2,1]},"b":1}');
  });

  it('drops undefined members and nulls undefined array items', () => {
    expect(stableStringify({ a: undefined, b: null, c: [undefined, 1] })).toBe('{"b":null,"c":[null,1]}');
  });

  it('is insensitive to insertion order', () => {
    expect(stableStringify({ x: 1, y: 2 })).toBe(stableStringify({ y: 2, x: 1 }));
  });
});

describe('hashes', () => {
  it('sha256 produces the standard hex digest', () => {
    expect(sha256('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('shortHash is the first 24 hex characters of the digest', () => {
    expect(shortHash('x')).toBe(digestPayload('x').slice(0, 24));
    expect(shortHash({ a: 1 })).toMatch(/^[a-f0-9]{24}$/);
  });

  it('computeFingerprint depends on stage, parameters and upstream', () => {
    const base = computeFingerprint('storyline', { sceneCount: 5 }, { extraction: 'abc' });
    expect(computeFingerprint('storyline', { sceneCount: 5 }, { extraction: 'abc' })).toBe(base);
    expect(computeFingerprint('storyline', { sceneCount: 6 }, { extraction: 'abc' })).not.toBe(base);
    expect(computeFingerprint('storyline', { sceneCount: 5 }, { extraction: 'abd' })).not.toBe(base);
    expect(computeFingerprint('narration', { sceneCount: 5 }, { extraction: 'abc' })).not.toBe(base);
  });
});

describe('stage fingerprints', () => {
  const settings = { aspectRatio: '16:9' };
  const params = resolveParameters({ sceneCount: 5, artStyle: 'manga' });

  it('only includes the parameters a stage reads', () => {
    expect(effectiveParameters('extraction', params, settings)).toEqual({});
    expect(effectiveParameters('scenePrompts', params, settings)).toEqual({ artStyle: 'manga', sceneCount: 5 });
    expect(effectiveParameters('narration', params, settings)).toEqual({ narrationStyle: 'dramatic', voiceTone: 'engaging' });
    expect(effectiveParameters('images', params, settings)).toEqual({ aspectRatio: '16:9' });
  });

  it('ignores parameters the stage does not read', () => {
    const other = resolveParameters({ sceneCount: 5, artStyle: 'noir' });
    expect(stageFingerprint('storyline', other, settings, 'd1')).toBe(stageFingerprint('storyline', params, settings, 'd1'));
    expect(stageFingerprint('scenePrompts', other, settings, 'd1')).not.toBe(
      stageFingerprint('scenePrompts', params, settings, 'd1')
    );
  });

  it('extraction does not depend on any parameter', () => {
    const other = resolveParameters({ sceneCount: 9, length: 'long' });
    expect(stageFingerprint('extraction', other, settings, null)).toBe(stageFingerprint('extraction', params, settings, null));
  });

  it('changes when the upstream digest changes', () => {
    expect(stageFingerprint('images', params, settings, 'aaa')).not.toBe(stageFingerprint('images', params, settings, 'bbb'));
  });
});
