import { solveInverse } from '../solver';
import { NotInvertibleError } from '../../errors';
import { isIdentity, multiply } from '../matrix-utils';

describe('solveInverse', () => {
  describe('LU (default)', () => {
    test('should invert a diagonal matrix exactly', () => {
      expect(
        solveInverse([
          [2, 0],
          [0, 2],
        ])
      ).toEqual([
        [0.5, 0],
        [0, 0.5],
      ]);
    });

    test('should invert a general 3x3 matrix', () => {
      const a = [
        [4, 7, 2],
        [3, 6, 1],
        [2, 5, 3],
      ];
      expect(isIdentity(multiply(a, solveInverse(a)))).toBe(true);
    });

    test('should pivot past a zero leading entry', () => {
      const a = [
        [0, 1],
        [1, 0],
      ];
      expect(solveInverse(a)).toEqual([
        [0, 1],
        [1, 0],
      ]);
    });

    test('should not mutate its input', () => {
      const a = [
        [1, 2],
        [3, 4],
      ];
      solveInverse(a);
      expect(a).toEqual([
        [1, 2],
        [3, 4],
      ]);
    });
  });

  describe('SVD', () => {
    test('should give the same inverse as LU', () => {
      const a = [
        [1, 2],
        [3, 4],
      ];
      const inverse = solveInverse(a, { method: 'svd' });
      expect(inverse[0][0]).toBeCloseTo(-2);
      expect(inverse[0][1]).toBeCloseTo(1);
      expect(inverse[1][0]).toBeCloseTo(1.5);
      expect(inverse[1][1]).toBeCloseTo(-0.5);
    });

    test('should reject a rank deficient matrix', () => {
      expect(() =>
        solveInverse(
          [
            [0, 0],
            [0, 0],
          ],
          { method: 'svd' }
        )
      ).toThrow('Matrix is rank deficient (rank 0 of 2)');
    });

    test('should reject an ill-conditioned matrix', () => {
      const a = [
        [1, 1],
        [1, 1 + 1e-13],
      ];
      expect(() => solveInverse(a, { method: 'svd' })).toThrow('Matrix is ill-conditioned (condition number');
    });

    test('should accept the ill-conditioned matrix under a smaller tolerance', () => {
      const a = [
        [1, 1],
        [1, 1 + 1e-13],
      ];
      expect(() => solveInverse(a, { method: 'svd', tolerance: 1e-15 })).not.toThrow();
    });
  });

  describe('failures', () => {
    test('should reject an all-zero matrix as singular', () => {
      let caught: unknown;
      try {
        solveInverse([
          [0, 0],
          [0, 0],
        ]);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(NotInvertibleError);
      expect(caught).toMatchObject({ name: 'NotInvertibleError', reason: 'singular', rows: 2, columns: 2 });
    });

    test('should reject linearly dependent rows', () => {
      expect(() =>
        solveInverse([
          [1, 2],
          [2, 4],
        ])
      ).toThrow('Matrix is singular to working precision');
    });

    test('should reject a nearly singular matrix within the default tolerance', () => {
      const a = [
        [1, 1],
        [1, 1 + 1e-15],
      ];
      expect(() => solveInverse(a)).toThrow(NotInvertibleError);
    });

    test('should accept the same matrix under a smaller tolerance', () => {
      const a = [
        [1, 1],
        [1, 1 + 1e-15],
      ];
      expect(() => solveInverse(a, { tolerance: 1e-20 })).not.toThrow();
    });

    test('should reject a non-square matrix', () => {
      expect(() =>
        solveInverse([
          [1, 2, 3],
          [4, 5, 6],
        ])
      ).toThrow('Matrix must be square, got 2x3');
    });

    test('should reject ragged rows', () => {
      expect(() => solveInverse([[1, 2], [3]])).toThrow('Matrix rows have inconsistent lengths');
    });

    test.each([
      ['NaN', NaN],
      ['Infinity', Infinity],
      ['-Infinity', -Infinity],
    ])('should reject a matrix containing %s', (_label, value) => {
      let caught: unknown;
      try {
        solveInverse([
          [value, 0],
          [0, 1],
        ]);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(NotInvertibleError);
      expect(caught).toMatchObject({ reason: 'non-finite', message: 'Matrix contains non-finite entries' });
    });

    test('should reject non-finite entries on the SVD path too', () => {
      expect(() =>
        solveInverse(
          [
            [1, 2],
            [NaN, 4],
          ],
          { method: 'svd' }
        )
      ).toThrow('Matrix contains non-finite entries');
    });

    test('should reject an empty matrix', () => {
      expect(() => solveInverse([])).toThrow('Cannot invert an empty matrix');
    });
  });
});
