// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { MetricsEngine } from '../src/engine.js';
import { aggregateWorkingCapital } from '../src/working-capital/index.js';
import { StubLedger, wc, wcRow, YEAR } from './helpers.js';

describe('aggregateWorkingCapital', () => {
  it('combines receivables, payables and inventory into NWC', () => {
    const metrics = aggregateWorkingCapital({
      receivables: [wc('AR', 100, 'Member'), wc('AR', 50, 'Sponsor')],
      payables: [wc('AP', 80)],
      inventory: [wc('INVENTORY', 200)],
    });

    expect(metrics).toEqual({
      totalAr: 150,
      arMember: 100,
      arSponsor: 50,
      arOther: 0,
      totalAp: 80,
      totalInventory: 200,
      nwc: 270,
    });
  });

  it('counts receivables without a detail in the total only', () => {
    const metrics = aggregateWorkingCapital({
      receivables: [wc('AR', 30, null), wc('AR', 20, 'Other')],
      payables: [],
      inventory: [],
    });
    expect(metrics.totalAr).toBe(50);
    expect(metrics.arMember + metrics.arSponsor + metrics.arOther).toBe(20);
  });

  it('reduces to receivables minus payables without inventory', () => {
    const metrics = aggregateWorkingCapital({
      receivables: [wc('AR', 12.3, 'Member')],
      payables: [wc('AP', 4.56)],
      inventory: [],
    });
    expect(metrics.totalInventory).toBe(0);
    expect(metrics.nwc).toBe(metrics.totalAr - metrics.totalAp);
  });

  it('is all zeros for empty inputs', () => {
    const metrics = aggregateWorkingCapital({ receivables: [], payables: [], inventory: [] });
    expect(metrics.nwc).toBe(0);
    expect(metrics.totalAr).toBe(0);
  });
});

describe('MetricsEngine.computeWorkingCapitalMetrics', () => {
  const ledger = new StubLedger({
    workingCapital: [
      wcRow('AR', '100', 'Member'),
      wcRow('AR', '50', 'Sponsor'),
      wcRow('AR', '999', 'Member', '2024-25'),
      wcRow('AP', '80'),
      wcRow('AP', '5', null, '2024-25'),
      wcRow('INVENTORY', '200'),
      wcRow('INVENTORY', '25', null, '2024-25'),
    ],
  });

  it('scopes receivables and payables to the book year', async () => {
    const metrics = await new MetricsEngine({ ledger }).computeWorkingCapitalMetrics(YEAR);
    expect(metrics.totalAr).toBe(150);
    expect(metrics.totalAp).toBe(80);
  });

  it('counts all inventory whatever year is asked for', async () => {
    const engine = new MetricsEngine({ ledger });
    const current = await engine.computeWorkingCapitalMetrics(YEAR);
    const previous = await engine.computeWorkingCapitalMetrics('2024-25');
    const unknown = await engine.computeWorkingCapitalMetrics('1999-00');

    expect(current.totalInventory).toBe(225);
    expect(previous.totalInventory).toBe(225);
    expect(unknown.totalInventory).toBe(225);
    expect(current.nwc).toBe(150 + 225 - 80);
  });

  it('keeps receivables below a cent', async () => {
    const engine = new MetricsEngine({
      ledger: new StubLedger({ workingCapital: [wcRow('AR', '0.004', 'Other'), wcRow('AR', '0.004', 'Other')] }),
    });
    const metrics = await engine.computeWorkingCapitalMetrics(YEAR);
    expect(metrics.totalAr).toBe(0.008);
    expect(metrics.arOther).toBe(0.008);
  });
});
