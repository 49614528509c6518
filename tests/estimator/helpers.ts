import { ItemMaster, OrderLine } from '../../src/types/estimator.types';

export function makeLine(overrides: Partial<OrderLine> = {}): OrderLine {
  return {
    itemCode: 'ITEM-1',
    qty: 1,
    unitType: null,
    location: '10-01-A02',
    zone: null,
    corridor: null,
    ...overrides,
  };
}

export function makeItem(overrides: Partial<ItemMaster> = {}): ItemMaster {
  return {
    itemCode: 'ITEM-1',
    active: true,
    unitType: null,
    fragility: null,
    spillRisk: null,
    pressureSensitivity: null,
    temperatureSensitivity: null,
    pickDifficulty: null,
    piecesPerUnit: null,
    packAttribute: null,
    ...overrides,
  };
}
