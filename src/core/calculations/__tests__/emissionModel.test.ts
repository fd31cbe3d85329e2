import {
  compareToBaseline,
  computeEmissions,
  computeSourceEmissions,
  treesToOffset,
} from '../emissionModel';
import { makeEntry } from './fixtures';

describe('Emission Model', () => {
  describe('computeEmissions', () => {
    it('returns an all-zero breakdown for an all-zero day', () => {
      expect(computeEmissions(makeEntry('2024-03-01'))).toEqual({
        homeEnergy: 0,
        transportation: 0,
        food: 0,
        total: 0,
      });
    });

    it('charges 0.4 kg per kWh of electricity', () => {
      const breakdown = computeEmissions(makeEntry('2024-03-01', { electricityKwh: 100 }));
      expect(breakdown.homeEnergy).toBeCloseTo(40.0, 10);
      expect(breakdown.transportation).toBe(0);
      expect(breakdown.food).toBe(0);
    });

    it('converts car miles to gallons at 25 mpg', () => {
      const breakdown = computeEmissions(makeEntry('2024-03-01', { carMiles: 25 }));
      expect(breakdown.transportation).toBeCloseTo(8.887, 10);
      expect(breakdown.homeEnergy).toBe(0);
    });

    it('weights meat, dairy and plant servings differently', () => {
      const breakdown = computeEmissions(
        makeEntry('2024-03-01', { meatServings: 2, dairyServings: 1, plantServings: 3 })
      );
      expect(breakdown.food).toBeCloseTo(7.3, 10);
    });

    it('adds flights to transportation', () => {
      const breakdown = computeEmissions(
        makeEntry('2024-03-01', { shortHaulFlights: 1, longHaulFlights: 1, transitMiles: 10 })
      );
      expect(breakdown.transportation).toBeCloseTo(2101.7, 10);
    });

    it('keeps total equal to the sum of the categories', () => {
      const days = [
        makeEntry('2024-03-01', { electricityKwh: 12.5, naturalGasTherms: 1.2, waterGallons: 80 }),
        makeEntry('2024-03-02', { carMiles: 33.3, transitMiles: 7, meatServings: 1 }),
        makeEntry('2024-03-03', { longHaulFlights: 1, dairyServings: 2.5, plantServings: 4 }),
      ];
      for (const day of days) {
        const b = computeEmissions(day);
        expect(b.total).toBe(b.homeEnergy + b.transportation + b.food);
      }
    });

    it('is deterministic', () => {
      const day = makeEntry('2024-03-01', { electricityKwh: 7.1, carMiles: 13, meatServings: 2 });
      expect(computeEmissions(day)).toEqual(computeEmissions(day));
    });
  });

  describe('computeSourceEmissions', () => {
    it('splits home energy into electricity, gas and water', () => {
      const sources = computeSourceEmissions(
        makeEntry('2024-03-01', { electricityKwh: 10, naturalGasTherms: 2, waterGallons: 1000 })
      );
      expect(sources.electricity).toBeCloseTo(4, 10);
      expect(sources.naturalGas).toBeCloseTo(10.6, 10);
      expect(sources.water).toBeCloseTo(0.2, 10);
    });

    it('prices flights per trip', () => {
      const sources = computeSourceEmissions(makeEntry('2024-03-01', { shortHaulFlights: 2, longHaulFlights: 1 }));
      expect(sources.flights).toBe(2600);
      expect(sources.car).toBe(0);
    });
  });

  describe('compareToBaseline', () => {
    it('is zero at the baseline', () => {
      expect(compareToBaseline(49.3)).toBeCloseTo(0, 10);
    });

    it('is a signed percentage', () => {
      expect(compareToBaseline(98.6)).toBeCloseTo(100, 10);
      expect(compareToBaseline(0)).toBeCloseTo(-100, 10);
      expect(compareToBaseline(30, 20)).toBeCloseTo(50, 10);
    });
  });

  describe('treesToOffset', () => {
    it('divides by the yearly absorption of one tree', () => {
      expect(treesToOffset(21.77)).toBeCloseTo(1, 10);
      expect(treesToOffset(0)).toBe(0);
    });
  });
});
