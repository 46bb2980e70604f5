import { indexOutOfRange } from '../errors';

/**
 * Reverse-time discounted cumulative sum: y[i] = x[i] + gamma * y[i+1]
 */
export function discount(xs: readonly number[], gamma: number): number[] {
  const out = new Array<number>(xs.length);
  let running = 0;
  for (let i = xs.length - 1; i >= 0; i--) {
    running = xs[i] + gamma * running;
    out[i] = running;
  }
  return out;
}

export interface AdvantageTargets {
  discountedReturns: number[];
  advantages: number[];
}

/**
 * Discounted returns and GAE advantages for one rollout. Lambda is folded
 * into gamma; advantages are not normalized here.
 */
export function computeAdvantages(
  rewards: readonly number[],
  values: readonly number[],
  bootstrapValue: number,
  gamma: number
): AdvantageTargets {
  if (rewards.length !== values.length) {
    throw indexOutOfRange(`Got ${rewards.length} rewards for ${values.length} values`);
  }

  const valuesPlus = [...values, bootstrapValue];
  const discountedReturns = discount([...rewards, bootstrapValue], gamma).slice(0, -1);

  // TD error: δ = r + γ*V(s') - V(s)
  const tdResiduals = rewards.map((reward, i) => reward + gamma * valuesPlus[i + 1] - valuesPlus[i]);
  const advantages = discount(tdResiduals, gamma);

  return { discountedReturns, advantages };
}
