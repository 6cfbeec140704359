export const EconomyErrorKinds = [
  "NotFound",
  "Unauthorized",
  "InsufficientResource",
  "InsufficientCash",
  "InsufficientManpower",
  "InvalidState",
  "AdmissionLimitExceeded",
  "StoreError"
] as const;

export type EconomyErrorKind = (typeof EconomyErrorKinds)[number];

export type EconomyError = {
  kind: EconomyErrorKind;
  message: string;
  resource?: string;
  shortfall?: number;
};
