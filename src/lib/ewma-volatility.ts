/**
 * EWMA volatility estimator
 *
 * variance_t = λ * variance_{t-1} + (1 - λ) * r_t²
 *
 * The first update seeds the variance with the population variance of the
 * batch (or 0.01 for a single return). Before any update, volatility reads
 * as the configured default.
 */
export class EwmaVolatility {
  private variance: number | null = null;

  constructor(
    private readonly lambda: number = 0.94,
    private readonly defaultVolatility: number = 0.1,
  ) {}

  update(returns: readonly number[]): void {
    const finite = returns.filter((r) => Number.isFinite(r));
    if (finite.length === 0) return;

    if (this.variance === null) {
      this.variance = finite.length > 1 ? populationVariance(finite) : 0.01;
    }

    for (const r of finite) {
      this.variance = this.lambda * this.variance + (1 - this.lambda) * r * r;
    }
  }

  getVolatility(): number {
    return this.variance === null ? this.defaultVolatility : Math.sqrt(this.variance);
  }

  getVariance(): number {
    return this.variance ?? 0.01;
  }

  isInitialized(): boolean {
    return this.variance !== null;
  }
}

export function populationVariance(values: readonly number[]): number {
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  return values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
}
