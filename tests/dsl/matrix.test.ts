import {
  MatrixTooLargeError,
  cartesianProduct,
  defaultInstanceName,
  expandMatrix,
  matchesPartial,
  matrixJobName,
  productSize,
} from '../../src/dsl/matrix';

describe('cartesianProduct', () => {
  test('first axis varies slowest', () => {
    const combinations = cartesianProduct({ os: ['ubuntu-18.04', 'macos-latest'], 'python-version': ['3.7', '3.8'] });
    expect(combinations).toEqual([
      { os: 'ubuntu-18.04', 'python-version': '3.7' },
      { os: 'ubuntu-18.04', 'python-version': '3.8' },
      { os: 'macos-latest', 'python-version': '3.7' },
      { os: 'macos-latest', 'python-version': '3.8' },
    ]);
  });

  test('single value per axis yields one combination', () => {
    expect(cartesianProduct({ os: ['ubuntu-18.04'], 'python-version': [3.7] })).toEqual([
      { os: 'ubuntu-18.04', 'python-version': 3.7 },
    ]);
  });

  test('no axes yields one empty combination', () => {
    expect(cartesianProduct({})).toEqual([{}]);
  });
});

describe('productSize', () => {
  test('multiplies axis lengths', () => {
    expect(productSize({ os: ['a', 'b', 'c'], 'python-version': ['3.7', '3.8'] })).toBe(6);
  });
});

describe('matchesPartial', () => {
  test('compares values by their text', () => {
    expect(matchesPartial({ 'python-version': 3.7 }, { 'python-version': '3.7' })).toBe(true);
    expect(matchesPartial({ os: 'ubuntu-18.04' }, { os: 'macos-latest' })).toBe(false);
    expect(matchesPartial({ os: 'ubuntu-18.04' }, { arch: 'x64' })).toBe(false);
  });
});

describe('expandMatrix', () => {
  test('undefined matrix is a single empty instance', () => {
    expect(expandMatrix(undefined)).toEqual([{}]);
  });

  test('job count equals the product of axis lengths', () => {
    const combinations = expandMatrix({
      axes: { os: ['ubuntu-18.04', 'ubuntu-20.04', 'macos-latest'], 'python-version': ['3.7', '3.8'] },
      include: [],
      exclude: [],
    });
    expect(combinations).toHaveLength(6);
  });

  test('exclude drops matching combinations', () => {
    const combinations = expandMatrix({
      axes: { os: ['ubuntu-18.04', 'macos-latest'], 'python-version': ['3.7', '3.8'] },
      include: [],
      exclude: [{ os: 'macos-latest', 'python-version': '3.7' }],
    });
    expect(combinations).toEqual([
      { os: 'ubuntu-18.04', 'python-version': '3.7' },
      { os: 'ubuntu-18.04', 'python-version': '3.8' },
      { os: 'macos-latest', 'python-version': '3.8' },
    ]);
  });

  test('include extends matching combinations with extra keys', () => {
    const combinations = expandMatrix({
      axes: { os: ['ubuntu-18.04', 'macos-latest'] },
      include: [{ os: 'macos-latest', experimental: true }],
      exclude: [],
    });
    expect(combinations).toEqual([{ os: 'ubuntu-18.04' }, { os: 'macos-latest', experimental: true }]);
  });

  test('include that matches nothing is appended', () => {
    const combinations = expandMatrix({
      axes: { os: ['ubuntu-18.04'], 'python-version': ['3.7'] },
      include: [{ os: 'windows-latest', 'python-version': '3.9' }],
      exclude: [],
    });
    expect(combinations).toEqual([
      { os: 'ubuntu-18.04', 'python-version': '3.7' },
      { os: 'windows-latest', 'python-version': '3.9' },
    ]);
  });

  test('include never overwrites an axis value', () => {
    const combinations = expandMatrix({
      axes: { os: ['ubuntu-18.04'] },
      include: [{ os: 'ubuntu-18.04', 'python-version': '3.7' }],
      exclude: [],
    });
    expect(combinations).toEqual([{ os: 'ubuntu-18.04', 'python-version': '3.7' }]);
  });

  test('include-only matrix', () => {
    const combinations = expandMatrix({
      axes: {},
      include: [{ os: 'ubuntu-18.04' }, { os: 'macos-latest' }],
      exclude: [],
    });
    expect(combinations).toEqual([{ os: 'ubuntu-18.04' }, { os: 'macos-latest' }]);
  });

  test('rejects products over the limit', () => {
    const values = Array.from({ length: 17 }, (_, i) => `v${i}`);
    expect(() => expandMatrix({ axes: { a: values, b: values }, include: [], exclude: [] })).toThrow(
      MatrixTooLargeError,
    );
  });
});

describe('instance names', () => {
  test('default name lists the matrix values', () => {
    expect(defaultInstanceName('build', { os: 'ubuntu-18.04', 'python-version': 3.7 })).toBe(
      'build (ubuntu-18.04, 3.7)',
    );
    expect(defaultInstanceName('build', {})).toBe('build');
  });

  test('job name substitutes matrix expressions', () => {
    const name = matrixJobName(
      { id: 'build', name: 'Test on ${{ matrix.os }} / ${{ matrix.python-version }}' },
      { os: 'ubuntu-18.04', 'python-version': '3.7' },
    );
    expect(name).toBe('Test on ubuntu-18.04 / 3.7');
  });

  test('job name keeps expressions over other contexts', () => {
    const name = matrixJobName({ id: 'build', name: '${{ github.ref }} ${{ matrix.os }}' }, { os: 'ubuntu-18.04' });
    expect(name).toBe('${{ github.ref }} ubuntu-18.04');
  });
});
