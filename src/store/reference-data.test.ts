import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { ZodError } from 'zod/v4';
import { loadReferenceData, parseReferenceData } from './reference-data.js';

const BUNDLED_DATA_PATH = fileURLToPath(new URL('../../data/reference-data.json', import.meta.url));

const TARIFF = {
  regionId: 1,
  driverHourlyRate: '500.00',
  plannedWorkHours: 8,
  fuelPricePerLiter: '55.00',
  fuelConsumptionPer100km: '12.00',
  depreciationCoefficient: '0.1500',
  warehouseProcessingPerKg: '0',
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
};

describe('parseReferenceData', () => {
  it('parses decimal strings and numbers into exact decimals', () => {
    const data = parseReferenceData({ regions: [{ id: 1, name: 'North' }], tariffs: [TARIFF] });

    const [tariff] = data.tariffs;
    expect(tariff.depreciationCoefficient.toFixed(4)).toBe('0.1500');
    expect(tariff.plannedWorkHours.toFixed(2)).toBe('8.00');
    expect(tariff.warehouseProcessingPerKg.isZero()).toBe(true);
  });

  it('fills defaults for optional fields', () => {
    const data = parseReferenceData({
      regions: [{ id: 1, name: 'North' }],
      distributionCenters: [{ id: 1, regionId: 1, name: 'DC', location: { lat: 45, lng: 39 } }],
    });

    expect(data.regions[0].type).toBeNull();
    expect(data.tariffs).toEqual([]);
    expect(data.distributionCenters[0].isActive).toBe(true);
    expect(data.distributionCenters[0].address).toBeNull();
  });

  it('rejects a zero delivery point cost', () => {
    expect(() => parseReferenceData({
      regions: [{ id: 1, name: 'North' }],
      tariffs: [{ ...TARIFF, deliveryPointCost: '0' }],
    })).toThrow(ZodError);
  });

  it('rejects a discount percent above 100', () => {
    expect(() => parseReferenceData({
      regions: [{ id: 1, name: 'North' }],
      tariffs: [{ ...TARIFF, initialDiscountPercent: '100.01' }],
    })).toThrow(ZodError);
  });

  it('rejects a malformed decimal string', () => {
    expect(() => parseReferenceData({
      regions: [{ id: 1, name: 'North' }],
      tariffs: [{ ...TARIFF, fuelPricePerLiter: '55,00' }],
    })).toThrow(ZodError);
  });

  it('rejects a sector ring that is not closed into four positions', () => {
    expect(() => parseReferenceData({
      regions: [{ id: 1, name: 'North' }],
      sectors: [{
        id: 1,
        regionId: 1,
        name: 'Broken',
        boundary: { type: 'Polygon', coordinates: [[[39, 45], [40, 45], [39, 45]]] },
      }],
    })).toThrow(ZodError);
  });

  it('rejects a tariff for an unknown region', () => {
    expect(() => parseReferenceData({ regions: [], tariffs: [TARIFF] }))
      .toThrow('Tariff references unknown region 1');
  });

  it('rejects a second tariff for the same region', () => {
    expect(() => parseReferenceData({ regions: [{ id: 1, name: 'North' }], tariffs: [TARIFF, TARIFF] }))
      .toThrow('Region 1 has more than one tariff');
  });
});

describe('loadReferenceData', () => {
  it('loads the bundled reference data', async () => {
    const data = await loadReferenceData(BUNDLED_DATA_PATH);

    expect(data.regions.map((region) => region.id)).toEqual([1, 2]);
    expect(data.tariffs).toHaveLength(1);
    expect(data.sectors.every((sector) => sector.regionId === 1)).toBe(true);
  });

  it('fails for a missing file', async () => {
    await expect(loadReferenceData(fileURLToPath(new URL('./missing.json', import.meta.url))))
      .rejects.toThrow('ENOENT');
  });
});
