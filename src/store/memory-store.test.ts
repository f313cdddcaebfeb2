import { describe, it, expect } from 'vitest';
import { createMemoryStore } from './memory-store.js';
import { parseReferenceData } from './reference-data.js';
import { money } from '../pricing/decimal.js';

function square(minLng: number, minLat: number, maxLng: number, maxLat: number) {
  return {
    type: 'Polygon',
    coordinates: [[[minLng, minLat], [maxLng, minLat], [maxLng, maxLat], [minLng, maxLat], [minLng, minLat]]],
  };
}

function createTestData() {
  return parseReferenceData({
    regions: [
      { id: 1, name: 'North', type: 'oblast' },
      { id: 2, name: 'South', type: 'oblast' },
    ],
    tariffs: [
      {
        regionId: 1,
        driverHourlyRate: '500.00',
        plannedWorkHours: '8.00',
        fuelPricePerLiter: '55.00',
        fuelConsumptionPer100km: '12.00',
        depreciationCoefficient: '0.15',
        warehouseProcessingPerKg: '5.00',
        serviceFeePerKg: '10.00',
        deliveryPointCost: '150.00',
        standardTripWeight: '5000.00',
        standardBoxLength: 60,
        standardBoxWidth: 40,
        standardBoxHeight: 40,
        standardBoxMaxWeight: '30.00',
        minPointsForDiscount: 100,
        discountStepPoints: 50,
        initialDiscountPercent: '5.00',
        discountStepPercent: '5.00',
      },
    ],
    distributionCenters: [
      { id: 1, regionId: 1, name: 'DC One', location: { lat: 45.3, lng: 39.1 } },
      { id: 2, regionId: 1, name: 'DC Two', location: { lat: 45.4, lng: 39.1 }, isActive: false },
    ],
    sectors: [
      { id: 10, regionId: 1, name: 'West', boundary: square(39.0, 45.0, 39.2, 45.2) },
      { id: 11, regionId: 1, name: 'East', boundary: square(39.1, 45.0, 39.3, 45.2) },
      { id: 20, regionId: 2, name: 'Other', boundary: square(39.0, 45.0, 39.3, 45.2) },
    ],
    deliveryPoints: [
      { id: 1, name: 'West only', location: { lat: 45.1, lng: 39.05 } },
      { id: 2, name: 'Overlap', location: { lat: 45.1, lng: 39.15 } },
      { id: 3, name: 'Closed', location: { lat: 45.1, lng: 39.05 }, isActive: false },
      { id: 4, name: 'Outside', location: { lat: 46.0, lng: 41.0 } },
    ],
  });
}

describe('createMemoryStore', () => {
  describe('tariffs', () => {
    it('returns the tariff of a region', async () => {
      const store = createMemoryStore(createTestData());

      const tariff = await store.getTariff(1);

      expect(tariff?.deliveryPointCost.toFixed(2)).toBe('150.00');
      expect(tariff?.standardBoxLength).toBe(60);
    });

    it('returns null for a region without a tariff', async () => {
      const store = createMemoryStore(createTestData());

      await expect(store.getTariff(2)).resolves.toBeNull();
      await expect(store.getTariff(99)).resolves.toBeNull();
    });

    it('applies only the fields present in a patch', async () => {
      const store = createMemoryStore(createTestData());

      const updated = await store.updateTariff(1, {
        fuelPricePerLiter: money('60.50'),
        standardBoxHeight: 50,
        discountStepPercent: undefined,
      });

      expect(updated?.fuelPricePerLiter.toFixed(2)).toBe('60.50');
      expect(updated?.standardBoxHeight).toBe(50);
      expect(updated?.discountStepPercent.toFixed(2)).toBe('5.00');
      expect(updated?.regionId).toBe(1);

      const reread = await store.getTariff(1);
      expect(reread?.fuelPricePerLiter.toFixed(2)).toBe('60.50');
    });

    it('does not mutate a tariff a reader already holds', async () => {
      const store = createMemoryStore(createTestData());
      const before = await store.getTariff(1);

      await store.updateTariff(1, { driverHourlyRate: money(800) });

      expect(before?.driverHourlyRate.toNumber()).toBe(500);
    });

    it('returns null when updating a region without a tariff', async () => {
      const store = createMemoryStore(createTestData());

      await expect(store.updateTariff(2, { driverHourlyRate: money(800) })).resolves.toBeNull();
    });
  });

  it('finds regions by id', async () => {
    const store = createMemoryStore(createTestData());

    await expect(store.getRegion(2)).resolves.toEqual({ id: 2, name: 'South', type: 'oblast' });
    await expect(store.getRegion(3)).resolves.toBeNull();
  });

  it('lists active distribution centers only', async () => {
    const store = createMemoryStore(createTestData());

    const centers = await store.getActiveDistributionCenters();

    expect(centers.map((center) => center.id)).toEqual([1]);
  });

  describe('resolvePoints', () => {
    it('pairs each active point with every containing sector of the region', async () => {
      const store = createMemoryStore(createTestData());

      const matches = await store.resolvePoints([1, 2], 1);

      expect(matches).toEqual([
        { pointId: 1, sectorId: 10 },
        { pointId: 2, sectorId: 10 },
        { pointId: 2, sectorId: 11 },
      ]);
    });

    it('drops unknown, inactive and out-of-sector points', async () => {
      const store = createMemoryStore(createTestData());

      await expect(store.resolvePoints([3, 4, 404], 1)).resolves.toEqual([]);
    });

    it('only matches sectors of the requested region', async () => {
      const store = createMemoryStore(createTestData());

      await expect(store.resolvePoints([2], 2)).resolves.toEqual([{ pointId: 2, sectorId: 20 }]);
    });

    it('reports a repeated id once', async () => {
      const store = createMemoryStore(createTestData());

      await expect(store.resolvePoints([1, 1, 1], 1)).resolves.toEqual([{ pointId: 1, sectorId: 10 }]);
    });
  });

  it('counts the sectors of a region', async () => {
    const store = createMemoryStore(createTestData());

    await expect(store.countSectors(1)).resolves.toBe(2);
    await expect(store.countSectors(2)).resolves.toBe(1);
    await expect(store.countSectors(3)).resolves.toBe(0);
  });
});
