import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import {
  findDuplicatePackages,
  formatSpec,
  loadCondaManifest,
  manifestEntries,
  manifestSpecs,
  parseCondaManifest
} from './CondaManifest.js';
import { ManifestParseError } from '../core/errors.js';

const SAMPLE = [
  'numpy',
  '',
  '# Build tools',
  '# pinned for the Windows toolchain',
  'cmake>=3.12',
  'Cython=0.29  # generated extensions',
  '#scons',
  '',
  '# Formats',
  'hdf5 1.10.*',
  '#pyqt 5.9.*',
  '##',
  ''
].join('\n');

describe('parseCondaManifest', () => {
  it('should split entries into titled groups', () => {
    const manifest = parseCondaManifest(SAMPLE);

    expect(manifest.groups.map((g) => g.title)).toEqual(['', 'Build tools', 'Formats']);
    expect(manifest.groups[1].entries).toEqual([
      { name: 'cmake', constraint: '>=3.12', enabled: true, line: 5 },
      { name: 'cython', constraint: '=0.29', enabled: true, line: 6 },
      { name: 'scons', constraint: null, enabled: false, line: 7 }
    ]);
  });

  it('should keep space-separated version constraints', () => {
    const [, , formats] = parseCondaManifest(SAMPLE).groups;

    expect(formats.entries).toEqual([
      { name: 'hdf5', constraint: '1.10.*', enabled: true, line: 10 },
      { name: 'pyqt', constraint: '5.9.*', enabled: false, line: 11 }
    ]);
  });

  it('should ignore comments that are not package specs', () => {
    const manifest = parseCondaManifest('numpy\n#TODO: pin this\n');

    expect(manifest.groups).toEqual([
      { title: '', entries: [{ name: 'numpy', constraint: null, enabled: true, line: 1 }] }
    ]);
  });

  it('should read a doubled hash as a heading', () => {
    const manifest = parseCondaManifest('##Section\nnumpy\n');

    expect(manifest.groups).toEqual([
      { title: 'Section', entries: [{ name: 'numpy', constraint: null, enabled: true, line: 2 }] }
    ]);
  });

  it('should report the line of an invalid spec', () => {
    expect(() => parseCondaManifest('numpy\n>=1.0\n')).toThrow(ManifestParseError);
    expect(() => parseCondaManifest('numpy\n>=1.0\n')).toThrow('Invalid package spec on line 2: >=1.0');
  });
});

describe('manifest specs', () => {
  const manifest = parseCondaManifest(SAMPLE);

  it('should format install specs for enabled entries', () => {
    expect(manifestSpecs(manifest)).toEqual(['numpy', 'cmake>=3.12', 'cython=0.29', 'hdf5 1.10.*']);
  });

  it('should include disabled entries on request', () => {
    expect(manifestSpecs(manifest, { includeDisabled: true })).toEqual([
      'numpy',
      'cmake>=3.12',
      'cython=0.29',
      'scons',
      'hdf5 1.10.*',
      'pyqt 5.9.*'
    ]);
  });

  it('should format a single entry', () => {
    expect(formatSpec({ name: 'numpy', constraint: '>=1.15,<1.16', enabled: true, line: 1 })).toBe('numpy>=1.15,<1.16');
  });
});

describe('findDuplicatePackages', () => {
  it('should ignore disabled duplicates', () => {
    expect(findDuplicatePackages(parseCondaManifest('numpy\n#numpy=1.0\n'))).toEqual([]);
  });

  it('should report enabled duplicates case-insensitively', () => {
    expect(findDuplicatePackages(parseCondaManifest('six\nNumPy\nnumpy>=1.0\nsix\n'))).toEqual(['numpy', 'six']);
  });
});

describe('shipped Windows manifest', () => {
  const manifest = loadCondaManifest(
    fileURLToPath(new URL('../../manifests/conda-windows.txt', import.meta.url))
  );

  it('should parse into its thematic groups', () => {
    expect(manifest.groups.map((g) => g.title)).toEqual([
      'Python and build tooling',
      'Numerical core',
      'Data formats',
      'Graphical user interface',
      'Testing',
      'Documentation'
    ]);
  });

  it('should list packages without duplicates', () => {
    expect(manifestEntries(manifest)).toHaveLength(23);
    expect(manifestEntries(manifest, { includeDisabled: true })).toHaveLength(27);
    expect(findDuplicatePackages(manifest)).toEqual([]);
    expect(manifestSpecs(manifest)).toContain('python=3.6');
  });
});
