import { describe, it, expect } from 'vitest';
import * as model from '../src/model';

describe('Library surface', () => {
  it('exposes both core components and the runner', () => {
    const demand = model.projectDemand(80, 0.025, false, model.defaults);
    const result = model.evaluateScenario(demand, 'S1', model.defaults);
    expect(result.rows).toHaveLength(model.YEARS.length);
    expect(model.computeAll(80, 0.025).S1).toEqual(result);
  });

  it('exposes the error taxonomy', () => {
    expect(new model.UnknownScenarioError('S9', model.SCENARIO_IDS)).toBeInstanceOf(model.ModelError);
    expect(new model.MalformedSeriesError('short')).toBeInstanceOf(model.ModelError);
    expect(new model.InvalidInputError('bad').name).toBe('InvalidInputError');
  });

  it('custom assumptions flow through evaluation', () => {
    const pricier = model.buildAssumptions({ safPricePremium: 3 });
    const demand = model.projectDemand(80, 0.025, false, pricier);
    const cheap = model.getRow(model.evaluateScenario(demand, 'S1'), 2040);
    const dear = model.getRow(model.evaluateScenario(demand, 'S1', pricier), 2040);
    expect(dear.fuelCostBn).toBeGreaterThan(cheap.fuelCostBn);
    expect(dear.carbonCostBn).toBe(cheap.carbonCostBn);
  });
});
