import { capabilities, config } from '../src';

const pv = config.photovoltaic({ powerRated: 10, investmentPrice: 1000, omPrice: 20, lifetime: 20 });
const wt = config.windPower({ powerRated: 30, investmentPrice: 1500, omPrice: 40, lifetime: 20 });

describe('config factories', () => {
  it('apply default ratios and tag the family', () => {
    expect(pv).toEqual({
      type: 'simple',
      family: 'photovoltaic',
      powerRated: 10,
      investmentPrice: 1000,
      omPrice: 20,
      lifetime: 20,
      replacementPriceRatio: 1,
      salvagePriceRatio: 1,
    });
    expect(wt.family).toBe('wind');
    expect(config.nonDispatchable({ powerRated: 1, investmentPrice: 1, omPrice: 1, lifetime: 1 }).family).toBe('other');
  });

  it('keep explicit ratios', () => {
    const bt = config.battery({
      energyRated: 7,
      investmentPrice: 100,
      omPrice: 10,
      lifetimeCalendar: 20,
      lifetimeCycles: 3000,
      replacementPriceRatio: 0.9,
      salvagePriceRatio: 0.8,
    });
    expect(bt.replacementPriceRatio).toBe(0.9);
    expect(bt.salvagePriceRatio).toBe(0.8);
  });

  it('default the PV inverter loading ratio to 1', () => {
    const pvi = config.pvInverter({
      powerRated: 5,
      investmentPriceAc: 100,
      omPriceAc: 2,
      lifetimeAc: 15,
      investmentPriceDc: 1100,
      omPriceDc: 18,
      lifetimeDc: 25,
    });
    expect(pvi.ilr).toBe(1);
    expect(pvi.type).toBe('pv-inverter');
    expect(pvi.family).toBe('photovoltaic');
  });

  it('fill project timestep and currency', () => {
    expect(config.project(25, 0.05)).toEqual({ lifetime: 25, discountRate: 0.05, timestep: 1, currency: '€' });
    expect(config.project(25, 0.05, 0.5, '$').currency).toBe('$');
  });
});

describe('capabilities.deriveCapabilities', () => {
  it('reports configured components', () => {
    const caps = capabilities.deriveCapabilities({
      project: config.project(25, 0),
      generator: config.dieselGenerator({
        powerRated: 50,
        investmentPrice: 400,
        omPriceHours: 0.02,
        lifetimeHours: 15000,
        fuelPrice: 1,
      }),
      nondispatchables: [wt, pv, pv],
    });
    expect(caps).toEqual({
      hasGenerator: true,
      hasStorage: false,
      hasPhotovoltaic: true,
      hasWind: true,
      hasOther: false,
      sourceFamilies: ['wind', 'photovoltaic', 'photovoltaic'],
    });
  });

  it('handles a microgrid without sources', () => {
    const caps = capabilities.deriveCapabilities({ project: config.project(10, 0), nondispatchables: [] });
    expect(caps.hasPhotovoltaic).toBe(false);
    expect(caps.sourceFamilies).toEqual([]);
  });
});
