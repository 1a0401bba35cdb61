import {
  classifyRequest,
  collectAudioPaths,
  collectImagePaths,
  getCacheName,
  resolveAgainstScope,
  toAudioPath
} from '../../src/shared/utils/asset-paths';
import { SentenceGroup } from '../../src/shared/types/core';

const SCOPE = 'https://trainer.test/pwa/';

function group(images: Array<string | null | undefined>): SentenceGroup {
  return {
    word: '学校',
    reading: 'がっこう',
    meaning: 'school',
    level: 3,
    sentences: images.map((image, index) => ({ japanese: `文${index}`, english: `Sentence ${index}`, image }))
  };
}

describe('asset paths', () => {
  it('builds the bucket name from prefix and version', () => {
    expect(getCacheName('wk-trainer', 'v22')).toBe('wk-trainer-v22');
  });

  it('expands audio manifest entries under the audio directory', () => {
    expect(toAudioPath({ file: '先生_0.mp3' }, 'audio')).toBe('./audio/先生_0.mp3');
    expect(collectAudioPaths([{ file: 'a.mp3' }, { file: 'b.mp3' }, { file: 'a.mp3' }], 'audio'))
      .toEqual(['./audio/a.mp3', './audio/b.mp3']);
  });

  it('collects present image references once, in first-seen order', () => {
    const groups = [
      group(['images/b.png', undefined, '', '   ']),
      group([null, './images/a.png', '/images/b.png', 'images/a.png'])
    ];

    expect(collectImagePaths(groups)).toEqual(['./images/b.png', './images/a.png']);
  });

  it('returns no images for groups without sentences', () => {
    expect(collectImagePaths([group([])])).toEqual([]);
  });

  it('resolves paths against the worker scope with percent-encoding', () => {
    expect(resolveAgainstScope('./', SCOPE)).toBe('https://trainer.test/pwa/');
    expect(resolveAgainstScope('./audio/病院_0.mp3', SCOPE))
      .toBe('https://trainer.test/pwa/audio/%E7%97%85%E9%99%A2_0.mp3');
  });

  it.each([
    ['https://trainer.test/', 'navigation'],
    ['https://trainer.test/pwa/', 'navigation'],
    ['https://trainer.test/pwa/index.html', 'navigation'],
    ['https://trainer.test/pwa/index.html?fresh=1', 'navigation'],
    ['https://trainer.test/pwa/sentences.json', 'asset'],
    ['https://trainer.test/pwa/audio/a.mp3', 'asset'],
    ['https://trainer.test/pwa/images/index.html.png', 'asset']
  ])('classifies %s as %s', (url, expected) => {
    expect(classifyRequest(url, SCOPE, 'index.html')).toBe(expected);
  });
});
