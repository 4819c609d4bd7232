import type { PredictionFeatures } from "../types/prediction.ts";

export const FEATURE_FIELDS = ["s_l", "s_w", "p_l", "p_w"] as const satisfies readonly (keyof PredictionFeatures)[];

export type FeatureParseResult =
  | { ok: true; features: PredictionFeatures }
  | { ok: false; message: string; field?: string };

/**
 * Pull the four measurements out of a decoded request body.
 * Unknown fields are dropped so only the feature vector is forwarded.
 */
export function parseFeatures(body: unknown): FeatureParseResult {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    return { ok: false, message: "Request body must be a JSON object" };
  }

  const features: PredictionFeatures = { s_l: 0, s_w: 0, p_l: 0, p_w: 0 };
  for (const field of FEATURE_FIELDS) {
    const value: unknown = Reflect.get(body, field);
    if (value === undefined) {
      return { ok: false, message: `Missing required field '${field}'`, field };
    }
    if (typeof value !== "number" || !Number.isFinite(value)) {
      return { ok: false, message: `Field '${field}' must be a finite number`, field };
    }
    features[field] = value;
  }

  return { ok: true, features };
}
