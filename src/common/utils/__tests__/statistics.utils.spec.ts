import { absoluteDeviations, median, weightedMean, weightedStdDev } from "../statistics.utils";

describe("statistics utils", () => {
  describe("median", () => {
    it("should return the middle value of an odd-sized set", () => {
      expect(median([3, 1, 2])).toBe(2);
    });

    it("should average the two middle values of an even-sized set", () => {
      expect(median([100, 101, 99, 500])).toBe(100.5);
    });

    it("should not reorder the caller's array", () => {
      const values = [3, 1, 2];
      median(values);
      expect(values).toEqual([3, 1, 2]);
    });

    it("should throw on an empty set", () => {
      expect(() => median([])).toThrow(RangeError);
    });

    it("should not overflow when the two middle values are near the largest double", () => {
      expect(median([1.5e308, 1.7e308]) / 1e308).toBeCloseTo(1.6, 12);
    });
  });

  describe("absoluteDeviations", () => {
    it("should keep input order", () => {
      const deviations = absoluteDeviations([100, 101, 99, 500], 100.5);
      expect(deviations).toEqual([0.5, 0.5, 1.5, 399.5]);
      expect(median(deviations)).toBe(1);
    });
  });

  describe("weightedMean", () => {
    it("should weight values by their weight", () => {
      expect(
        weightedMean([
          { value: 10, weight: 1 },
          { value: 20, weight: 3 },
        ])
      ).toBe(17.5);
    });

    it("should throw when the total weight is zero", () => {
      expect(() => weightedMean([{ value: 1, weight: 0 }])).toThrow(RangeError);
    });

    it("should stay finite when value times weight overflows", () => {
      const mean = weightedMean([1, 2, 3].map(() => ({ value: 1e306, weight: 1000 })));
      expect(Number.isFinite(mean)).toBe(true);
      expect(mean / 1e306).toBeCloseTo(1, 12);
    });
  });

  describe("weightedStdDev", () => {
    it("should compute the population standard deviation", () => {
      const entries = [
        { value: 2, weight: 1 },
        { value: 4, weight: 1 },
      ];
      expect(weightedStdDev(entries, 3)).toBe(1);
    });

    it("should stay finite when the squared deviations overflow", () => {
      const entries = [
        { value: 1e308, weight: 1 },
        { value: -1e308, weight: 1 },
      ];
      expect(weightedStdDev(entries, 0)).toBe(1e308);
    });

    it("should be zero for identical values", () => {
      expect(weightedStdDev([{ value: 5, weight: 2 }], 5)).toBe(0);
    });
  });
});
