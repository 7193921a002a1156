import type { ClassificationMetrics, RegressionMetrics } from "./types";

function round(value: number, places = 4): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

/**
 * MAE, RMSE and R² for paired actual/predicted values. R² is left out when the
 * actuals have no variance.
 */
export function regressionMetrics(actual: readonly number[], predicted: readonly number[]): RegressionMetrics {
  if (actual.length !== predicted.length) {
    throw new Error(`Expected paired values, got ${actual.length} actual and ${predicted.length} predicted`);
  }
  if (actual.length === 0) return {};

  const n = actual.length;
  let absSum = 0;
  let sqSum = 0;
  for (let i = 0; i < n; i++) {
    const error = actual[i] - predicted[i];
    absSum += Math.abs(error);
    sqSum += error * error;
  }

  const mean = actual.reduce((total, value) => total + value, 0) / n;
  const totalVariance = actual.reduce((total, value) => total + (value - mean) ** 2, 0);

  const metrics: RegressionMetrics = {
    mae: round(absSum / n),
    rmse: round(Math.sqrt(sqSum / n)),
  };
  if (totalVariance > 0) {
    metrics.r2Score = round(1 - sqSum / totalVariance);
  }
  return metrics;
}

/**
 * Binary classification metrics; `positive` names the positive label. AUC is
 * computed only when scores are supplied and both classes are present.
 */
export function classificationMetrics(
  actual: readonly string[],
  predicted: readonly string[],
  positive: string,
  scores?: readonly number[]
): ClassificationMetrics {
  if (actual.length !== predicted.length) {
    throw new Error(`Expected paired labels, got ${actual.length} actual and ${predicted.length} predicted`);
  }
  if (actual.length === 0) return {};

  let tp = 0;
  let fp = 0;
  let fn = 0;
  let correct = 0;
  for (let i = 0; i < actual.length; i++) {
    const isPositive = actual[i] === positive;
    const predictedPositive = predicted[i] === positive;
    if (actual[i] === predicted[i]) correct++;
    if (predictedPositive && isPositive) tp++;
    else if (predictedPositive) fp++;
    else if (isPositive) fn++;
  }

  const metrics: ClassificationMetrics = { accuracy: round(correct / actual.length) };
  const precision = tp + fp > 0 ? tp / (tp + fp) : undefined;
  const recall = tp + fn > 0 ? tp / (tp + fn) : undefined;
  if (precision !== undefined) metrics.precision = round(precision);
  if (recall !== undefined) metrics.recall = round(recall);
  if (precision !== undefined && recall !== undefined && precision + recall > 0) {
    metrics.f1 = round((2 * precision * recall) / (precision + recall));
  }

  if (scores && scores.length === actual.length) {
    const auc = rocAuc(actual.map((label) => label === positive), scores);
    if (auc !== undefined) metrics.aucRoc = round(auc);
  }
  return metrics;
}

// Mann-Whitney formulation; ties count half.
function rocAuc(labels: readonly boolean[], scores: readonly number[]): number | undefined {
  const positives: number[] = [];
  const negatives: number[] = [];
  labels.forEach((label, i) => (label ? positives : negatives).push(scores[i]));
  if (positives.length === 0 || negatives.length === 0) return undefined;

  let wins = 0;
  for (const p of positives) {
    for (const n of negatives) {
      if (p > n) wins += 1;
      else if (p === n) wins += 0.5;
    }
  }
  return wins / (positives.length * negatives.length);
}
