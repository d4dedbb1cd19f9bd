/**
 * Outcome counters for one unit, or for any number of units combined.
 */
export interface TransferResult {
  readonly filesSucceeded: number;
  readonly filesFailed: number;
  readonly bytesTransferred: number;
}

export const emptyResult: TransferResult = Object.freeze({ filesSucceeded: 0, filesFailed: 0, bytesTransferred: 0 });

/**
 * Commutative and associative, with {@link emptyResult} as identity.
 */
export const combine = (a: TransferResult, b: TransferResult): TransferResult => ({
  filesSucceeded: a.filesSucceeded + b.filesSucceeded,
  filesFailed: a.filesFailed + b.filesFailed,
  bytesTransferred: a.bytesTransferred + b.bytesTransferred
});

export const combineAll = (results: Iterable<TransferResult>): TransferResult => {
  let total = emptyResult;
  for (const result of results) {
    total = combine(total, result);
  }
  return total;
};
