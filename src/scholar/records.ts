import { asArray, asInteger, asRecord, asString, type JsonRecord } from "./json.js";

export interface Institution {
  name: string;
  id?: string;
}

export interface Author {
  name: string;
  id?: string;
  institutions: Institution[];
}

export interface Work {
  title: string;
  ids: Record<string, string>;
  cited_by_count?: number;
  authors: Author[];
  publication_date?: string;
  preferred_fulltext_url?: string;
}

/**
 * Normalize an institution from any of the shapes OpenAlex returns:
 * an author affiliation (`{ institution: {...} }`), an authorship affiliation
 * (`{ raw_affiliation_string, institution_ids }`) or an institution entity.
 */
export function toInstitution(json: JsonRecord): Institution {
  let name = "";
  let id: string | undefined;

  if ("institution" in json) {
    const institution = asRecord(json.institution) ?? {};
    name = asString(institution.display_name) ?? "";
    id = asString(institution.id);
  } else if ("raw_affiliation_string" in json) {
    name = asString(json.raw_affiliation_string) ?? "";
    id = asString(asArray(json.institution_ids)[0]);
  } else if ("id" in json) {
    name = asString(json.display_name) ?? "";
    id = asString(json.id);
  }

  return withoutUndefined({ name: name.trim(), id: id?.trim() });
}

/**
 * Normalize an author from an authorship (`{ author: {...}, affiliations }`)
 * or an author entity.
 */
export function toAuthor(json: JsonRecord): Author {
  const info = asRecord(json.author) ?? {};
  const id = asString(info.id) || asString(json.id) || undefined;
  const name = asString(info.display_name) || asString(json.display_name) || "";
  const institutions = toList(json.affiliations, toInstitution);

  return withoutUndefined({ name: name.trim(), id: id?.trim(), institutions });
}

export function toWork(json: JsonRecord): Work {
  const title = asString(json.title) || asString(json.display_name) || "";
  const bestOa = asRecord(json.best_oa_location) ?? {};
  const primary = asRecord(json.primary_location) ?? {};

  const fulltextUrl =
    asString(bestOa.pdf_url) ??
    asString(bestOa.landing_page_url) ??
    asString(primary.pdf_url) ??
    asString(primary.landing_page_url);

  const ids: Record<string, string> = {};
  for (const [key, value] of Object.entries(asRecord(json.ids) ?? {})) {
    if (typeof value === "string") ids[key] = value.trim();
  }

  return withoutUndefined({
    title: title.trim(),
    ids,
    cited_by_count: asInteger(json.cited_by_count),
    authors: toList(json.authorships, toAuthor),
    publication_date: asString(json.publication_date)?.trim(),
    preferred_fulltext_url: fulltextUrl?.trim(),
  });
}

/**
 * Map every object entry of `value` (non-objects are skipped).
 */
export function toList<T>(value: unknown, map: (json: JsonRecord) => T): T[] {
  const out: T[] = [];
  for (const item of asArray(value)) {
    const record = asRecord(item);
    if (record) out.push(map(record));
  }
  return out;
}

function withoutUndefined<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    if (Reflect.get(value, key) === undefined) {
      Reflect.deleteProperty(value, key);
    }
  }
  return value;
}
