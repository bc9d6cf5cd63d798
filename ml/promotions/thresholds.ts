export type GateThresholds = {
  readonly min_accuracy: number;
  readonly min_f1: number;
};

// Gates default open; deployments set PROMOTE_MIN_ACCURACY / PROMOTE_MIN_F1.
export const DEFAULT_THRESHOLDS: GateThresholds = Object.freeze({
  min_accuracy: 0,
  min_f1: 0,
});

export function freezeThresholds(thresholds: GateThresholds): GateThresholds {
  return Object.freeze({ min_accuracy: thresholds.min_accuracy, min_f1: thresholds.min_f1 });
}
