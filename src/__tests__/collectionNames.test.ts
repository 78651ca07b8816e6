import os from 'os';
import path from 'path';
import {
  compareNames,
  isLetteredCollection,
  sortNames,
} from '../common/collectionNames';
import {
  expandHome,
  globToRegExp,
  isMissingPathError,
  resolveUserPath,
} from '../common/directoryEntries';
import { classifyCameraFile } from '../common/fileTypes';

describe('isLetteredCollection', () => {
  it.each(['A', 'Z', 'É'])('accepts the single uppercase letter %s', (name) => {
    expect(isLetteredCollection(name)).toBe(true);
  });

  it.each(['a', 'AB', 'A1', '1', '', 'notes'])('rejects %p', (name) => {
    expect(isLetteredCollection(name)).toBe(false);
  });
});

describe('ordinal name ordering', () => {
  it('sorts uppercase before lowercase and does not use locale collation', () => {
    expect(sortNames(['b', 'C', 'a', 'B'])).toEqual(['B', 'C', 'a', 'b']);
  });

  it('compares by code point', () => {
    expect(compareNames('puck10', 'puck2')).toBeLessThan(0);
    expect(compareNames('same', 'same')).toBe(0);
  });
});

describe('globToRegExp', () => {
  it('treats dots literally and expands wildcards', () => {
    const matcher = globToRegExp('SPOT.XDS*SpotsPerImage*.png');
    expect(matcher.test('SPOT.XDS.SpotsPerImage.png')).toBe(true);
    expect(matcher.test('SPOT.XDS_run2_SpotsPerImage_x.png')).toBe(true);
    expect(matcher.test('SPOTxXDS.SpotsPerImage.png')).toBe(false);
    expect(matcher.test('SPOT.XDS.SpotsPerImage.png.bak')).toBe(false);
  });

  it('matches a single character for ?', () => {
    const matcher = globToRegExp('frame_?.png');
    expect(matcher.test('frame_1.png')).toBe(true);
    expect(matcher.test('frame_12.png')).toBe(false);
  });
});

describe('user paths', () => {
  it('expands a leading tilde to the home directory', () => {
    expect(expandHome('~')).toBe(os.homedir());
    expect(expandHome('~/reports/r.html')).toBe(path.join(os.homedir(), 'reports/r.html'));
    expect(expandHome('reports/~/r.html')).toBe('reports/~/r.html');
  });

  it('resolves to an absolute path', () => {
    expect(resolveUserPath('~/r.json')).toBe(path.join(os.homedir(), 'r.json'));
    expect(resolveUserPath('out/r.json')).toBe(path.resolve('out/r.json'));
  });

  it('recognises missing-path errors only', () => {
    const missing = Object.assign(new Error('nope'), { code: 'ENOENT' });
    const looped = Object.assign(new Error('loop'), { code: 'ELOOP' });

    expect(isMissingPathError(missing)).toBe(true);
    expect(isMissingPathError(looped)).toBe(false);
    expect(isMissingPathError('ENOENT')).toBe(false);
  });
});

describe('classifyCameraFile', () => {
  it('recognises image extensions case-insensitively', () => {
    expect(classifyCameraFile('shot.JPG')).toBe('image');
    expect(classifyCameraFile('nested/scan.tiff')).toBe('image');
  });

  it('recognises CSV and ignores other files', () => {
    expect(classifyCameraFile('positions.csv')).toBe('csv');
    expect(classifyCameraFile('notes.txt')).toBeNull();
  });
});
