export type RecommendationErrorKind =
  | "EmptyResponse"
  | "MalformedJSON"
  | "NotAnArray"
  | "ItemNotObject"
  | "InvalidPaperId"
  | "InvalidCategory"
  | "InvalidReason"
  | "UnknownPaperId";

/**
 * The model's reply could not be turned into recommendations. Always fatal
 * for the run; `raw` carries the reply verbatim for postmortem.
 */
export class RecommendationError extends Error {
  constructor(
    readonly kind: RecommendationErrorKind,
    message: string,
    readonly raw: string,
    readonly itemIndex?: number
  ) {
    super(raw ? `${message}. Raw response:\n${raw}` : message);
    this.name = "RecommendationError";
  }
}
