export type ParamValue = string | number | boolean | null | undefined;
export type ParamMapping = Readonly<Record<string, ParamValue>>;
export type ParamPair = readonly [string, ParamValue];

/**
 * Query parameters for one request.
 *
 * - `mapping`: merged over the client's defaults (caller wins), nullish values dropped.
 * - `pairs`: ordered key/value pairs sent as-is; defaults are not applied.
 * - `opaque`: handed to the transport uninterpreted.
 */
export type QueryParams =
  | { kind: "mapping"; values: ParamMapping }
  | { kind: "pairs"; pairs: readonly ParamPair[] }
  | { kind: "opaque"; value: unknown };

export function mapping(values: ParamMapping): QueryParams {
  return { kind: "mapping", values };
}

export function pairs(list: readonly ParamPair[]): QueryParams {
  return { kind: "pairs", pairs: list };
}

export function opaque(value: unknown): QueryParams {
  return { kind: "opaque", value };
}

export type ParamsInput = QueryParams | ParamMapping | readonly ParamPair[];

/**
 * Tag shorthand inputs: an array of 2-tuples becomes `pairs`, a plain object
 * becomes `mapping`. Already-tagged values pass through.
 */
export function toQueryParams(input: ParamsInput): QueryParams {
  if (isPairList(input)) return pairs(input);
  if (isQueryParams(input)) return input;
  return mapping(input);
}

function isPairList(input: ParamsInput): input is readonly ParamPair[] {
  return Array.isArray(input);
}

function isQueryParams(input: QueryParams | ParamMapping): input is QueryParams {
  const kind: unknown = input.kind;
  if (kind === "mapping") {
    const values: unknown = "values" in input ? input.values : undefined;
    return typeof values === "object" && values !== null;
  }
  if (kind === "pairs") {
    const list: unknown = "pairs" in input ? input.pairs : undefined;
    return Array.isArray(list);
  }
  return kind === "opaque" && "value" in input;
}

/**
 * Parameters after merging, ready for serialization.
 */
export type MergedParams =
  | { kind: "mapping"; values: Record<string, string | number | boolean> }
  | { kind: "pairs"; pairs: readonly ParamPair[] }
  | { kind: "opaque"; value: unknown };

export function mergeParams(
  defaults: ParamMapping,
  params?: QueryParams,
): MergedParams {
  if (params === undefined) {
    return { kind: "mapping", values: dropNullish(defaults) };
  }

  switch (params.kind) {
    case "mapping":
      return { kind: "mapping", values: dropNullish({ ...defaults, ...params.values }) };
    case "pairs":
      return { kind: "pairs", pairs: params.pairs };
    case "opaque":
      return { kind: "opaque", value: params.value };
  }
}

function dropNullish(values: ParamMapping): Record<string, string | number | boolean> {
  const out: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== null && value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

/**
 * Apply merged parameters to a URL.
 *
 * Mapping keys replace any same-named parameter already on the URL; pairs are
 * appended in order (nullish values become empty strings). Opaque values are
 * accepted only as a query string or URLSearchParams.
 *
 * @throws TypeError for an opaque value the transport cannot encode
 */
export function applyParams(url: URL, merged: MergedParams): URL {
  switch (merged.kind) {
    case "mapping":
      for (const [key, value] of Object.entries(merged.values)) {
        url.searchParams.set(key, String(value));
      }
      return url;
    case "pairs":
      for (const [key, value] of merged.pairs) {
        url.searchParams.append(key, value === null || value === undefined ? "" : String(value));
      }
      return url;
    case "opaque": {
      const { value } = merged;
      if (value === undefined || value === null) return url;
      if (typeof value === "string") {
        url.search = value.startsWith("?") ? value.slice(1) : value;
        return url;
      }
      if (value instanceof URLSearchParams) {
        url.search = value.toString();
        return url;
      }
      throw new TypeError(
        `Unsupported query parameter value of type ${Array.isArray(value) ? "array" : typeof value}`,
      );
    }
  }
}
