/** The NLP capability could not answer (timeout, error, missing credentials). */
export class UpstreamUnavailableError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "UpstreamUnavailableError";
  }
}

/** A trending recomputation failed and there was no earlier result to serve. */
export class RetrievalFailedError extends Error {
  readonly clusterKey: string;

  constructor(clusterKey: string, options?: ErrorOptions) {
    super(`Trending results for cluster ${clusterKey} could not be computed`, options);
    this.name = "RetrievalFailedError";
    this.clusterKey = clusterKey;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}
