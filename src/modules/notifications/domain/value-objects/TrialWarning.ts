/**
 * Trial expiry warnings, from least to most urgent
 */
export enum TrialWarning {
  NONE = 'NONE',
  THREE_DAY = 'THREE_DAY',
  ONE_DAY = 'ONE_DAY',
}

export type DueTrialWarning = Exclude<TrialWarning, TrialWarning.NONE>;
