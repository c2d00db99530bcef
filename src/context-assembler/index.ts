/**
 * Context Assembler Module
 *
 * Converts one selected dataset row into a compact, model-ready
 * SelectionContext. Pure and deterministic: no network, no model calls.
 *
 * Responsibilities:
 * - Normalize column names and resolve them through the alias table
 * - Parse numeric facts leniently (separators, units, million/billion)
 * - Derive the entity id (explicit id, SYSTEM_ID column, or CITY + COUNTRY)
 * - Fail with MissingRequiredFieldError when no id or name can be derived
 */

import { MissingRequiredFieldError } from '../errors/index.js';
import type { DatasetRow, SelectionContext, SelectionFacts } from '../types/index.js';

// ============================================================================
// Column Aliases
// ============================================================================

export type CanonicalColumn =
  | 'SYSTEM_ID'
  | 'SYSTEM_NAME'
  | 'CITY'
  | 'COUNTRY'
  | 'OPENED_YEAR'
  | 'NUMBER_OF_LINES'
  | 'TOTAL_MILES'
  | 'STATIONS'
  | 'ANNUAL_RIDERSHIP'
  | 'CITY_POPULATION'
  | 'LAST_MAJOR_UPDATE'
  | 'VISITED';

/**
 * Accepted spellings per canonical column, already normalized
 */
export const COLUMN_ALIASES: Readonly<Record<CanonicalColumn, readonly string[]>> = {
  SYSTEM_ID: ['SYSTEM_ID', 'SEQUENCE', 'ENTITY_ID', 'ID'],
  SYSTEM_NAME: ['SYSTEM_NAME', 'NAME', 'ENTITY_NAME'],
  CITY: ['CITY'],
  COUNTRY: ['COUNTRY'],
  OPENED_YEAR: ['OPENED_YEAR', 'YEAR_OPENED', 'OPENED'],
  NUMBER_OF_LINES: ['NUMBER_OF_LINES', 'LINES', 'LINE_COUNT'],
  TOTAL_MILES: ['TOTAL_MILES', 'SYSTEM_LENGTH_MILES', 'SYSTEM_LENGTH', 'LENGTH_MILES'],
  STATIONS: ['STATIONS', 'STATION_COUNT'],
  ANNUAL_RIDERSHIP: ['ANNUAL_RIDERSHIP', 'RIDERSHIP'],
  CITY_POPULATION: ['CITY_POPULATION', 'POPULATION'],
  LAST_MAJOR_UPDATE: ['LAST_MAJOR_UPDATE', 'YEAR_OF_LAST_EXPANSION', 'LAST_EXPANSION'],
  VISITED: ['VISITED', 'RIDDEN'],
};

const EMPTY_MARKERS = new Set(['', 'nan', 'none', 'null', 'n/a', 'na', '<na>', 'nat']);

const KM_PER_MILE = 1.609344;

// ============================================================================
// Cell helpers
// ============================================================================

/**
 * "System length   miles" -> "SYSTEM_LENGTH_MILES", "Ridden?" -> "RIDDEN"
 */
export function normalizeColumnName(name: string): string {
  return name
    .trim()
    .replace(/[^A-Za-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .toUpperCase();
}

export function isEmptyCell(value: unknown): boolean {
  if (value === undefined || value === null) {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isNaN(value);
  }
  if (typeof value === 'string') {
    return EMPTY_MARKERS.has(value.trim().toLowerCase());
  }
  return false;
}

/**
 * Map normalized column name to cell value. The first non-empty cell wins
 * when two raw columns normalize to the same name.
 */
export function indexRow(row: DatasetRow): Map<string, unknown> {
  const indexed = new Map<string, unknown>();
  for (const [column, value] of Object.entries(row)) {
    const key = normalizeColumnName(column);
    if (!indexed.has(key) && !isEmptyCell(value)) {
      indexed.set(key, value);
    }
  }
  return indexed;
}

function lookup(indexed: Map<string, unknown>, column: CanonicalColumn): unknown {
  for (const alias of COLUMN_ALIASES[column]) {
    if (indexed.has(alias)) {
      return indexed.get(alias);
    }
  }
  return undefined;
}

function cellText(value: unknown): string | null {
  if (isEmptyCell(value)) {
    return null;
  }
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number' || typeof value === 'bigint') {
    return String(value);
  }
  return null;
}

// ============================================================================
// Numeric parsing
// ============================================================================

/**
 * count: lines, stations
 * length: track length, reported in miles
 * magnitude: ridership and population, which may say "1.7 billion"
 * year: four-digit year extraction
 */
export type NumericKind = 'count' | 'length' | 'magnitude' | 'year';

const NUMBER_PATTERN = /[-+]?(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?/;

function firstNumber(text: string): number | null {
  const match = text.match(NUMBER_PATTERN);
  if (!match) {
    return null;
  }
  const parsed = Number(match[0].replace(/,/g, ''));
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Lenient numeric parsing for dataset cells. Returns null for anything that
 * does not contain a usable number.
 */
export function parseNumericValue(value: unknown, kind: NumericKind): number | null {
  if (isEmptyCell(value) || typeof value === 'boolean') {
    return null;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return null;
    }
    return kind === 'year' ? Math.round(value) : value;
  }

  if (typeof value !== 'string') {
    return null;
  }

  const text = value.replace(/\u00A0/g, ' ').trim();

  if (kind === 'year') {
    const year = text.match(/\d{4}/);
    return year ? parseInt(year[0], 10) : null;
  }

  if (kind === 'magnitude') {
    const scaled = text.match(/([\d,]+(?:\.\d+)?)\s*(billion|million|bn|m)\b/i);
    if (scaled?.[1] && scaled[2]) {
      const base = Number(scaled[1].replace(/,/g, ''));
      const unit = scaled[2].toLowerCase();
      const multiplier = unit === 'billion' || unit === 'bn' ? 1_000_000_000 : 1_000_000;
      return Number.isFinite(base) ? Math.round(base * multiplier) : null;
    }
  }

  if (kind === 'length') {
    const km = text.match(/([\d,]+(?:\.\d+)?)\s*(?:km|kilomet)/i);
    const mi = text.match(/([\d,]+(?:\.\d+)?)\s*(?:mi\b|miles?)/i);
    if (!mi && km?.[1]) {
      const kilometres = Number(km[1].replace(/,/g, ''));
      return Number.isFinite(kilometres) ? Math.round((kilometres / KM_PER_MILE) * 10) / 10 : null;
    }
    if (mi?.[1]) {
      const miles = Number(mi[1].replace(/,/g, ''));
      return Number.isFinite(miles) ? miles : null;
    }
    return firstNumber(text);
  }

  // Parenthetical notes such as "28 (incl. 3 branches)" are not the value
  return firstNumber(text.replace(/\([^)]*\)/g, ' '));
}

/**
 * yes/no, y/n, true/false, 1/0, x and booleans. Anything else is unknown.
 */
export function parseVisitedFlag(value: unknown): boolean | null {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    if (value === 1) return true;
    if (value === 0) return false;
    return null;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const normalized = value.trim().toLowerCase();
  if (['yes', 'y', 'true', '1', 'x'].includes(normalized)) {
    return true;
  }
  if (['no', 'n', 'false', '0'].includes(normalized)) {
    return false;
  }
  return null;
}

// ============================================================================
// Assembly
// ============================================================================

export interface AssembleOptions {
  /** Id from the selection event; takes precedence over the row */
  entityId?: string;
}

/**
 * "Rivertown", "Exampleland" -> "RIVERTOWN_EXAMPLELAND"
 */
export function deriveEntityId(city: string, country: string): string {
  return `${city}_${country}`.trim().toUpperCase().replace(/\s+/g, '_');
}

/**
 * Build the SelectionContext for one dataset row
 */
export function assembleContext(row: DatasetRow, options: AssembleOptions = {}): SelectionContext {
  const indexed = indexRow(row);

  const city = cellText(lookup(indexed, 'CITY'));
  const country = cellText(lookup(indexed, 'COUNTRY'));
  const entityName = cellText(lookup(indexed, 'SYSTEM_NAME'));

  const explicitId = options.entityId?.trim();
  let entityId: string | null = explicitId ? explicitId : cellText(lookup(indexed, 'SYSTEM_ID'));
  if (!entityId && city && country) {
    entityId = deriveEntityId(city, country);
  }

  const missing: string[] = [];
  if (!entityId) missing.push('entity_id');
  if (!entityName) missing.push('entity_name');
  if (!entityId || !entityName) {
    throw new MissingRequiredFieldError(missing);
  }

  const facts: SelectionFacts = Object.freeze({
    openedYear: parseNumericValue(lookup(indexed, 'OPENED_YEAR'), 'year'),
    numberOfLines: parseNumericValue(lookup(indexed, 'NUMBER_OF_LINES'), 'count'),
    totalMiles: parseNumericValue(lookup(indexed, 'TOTAL_MILES'), 'length'),
    stations: parseNumericValue(lookup(indexed, 'STATIONS'), 'count'),
    annualRidership: parseNumericValue(lookup(indexed, 'ANNUAL_RIDERSHIP'), 'magnitude'),
    cityPopulation: parseNumericValue(lookup(indexed, 'CITY_POPULATION'), 'magnitude'),
    lastMajorUpdate: parseNumericValue(lookup(indexed, 'LAST_MAJOR_UPDATE'), 'year'),
    visited: parseVisitedFlag(lookup(indexed, 'VISITED')),
  });

  return Object.freeze({ entityId, entityName, city, country, facts });
}
