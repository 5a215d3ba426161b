export class InsufficientDataError extends Error {
  readonly code = "insufficient_data";

  constructor(
    readonly distinctTitles: number,
    readonly requestedClusters: number
  ) {
    super(
      `Need at least ${requestedClusters} distinct titles to build ${requestedClusters} topic clusters, found ${distinctTitles}`
    );
    this.name = "InsufficientDataError";
  }
}
