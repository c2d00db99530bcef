/**
 * Renderers Module
 *
 * The validated Dossier is the only canonical artifact. Every rendered
 * format is a view derived from it.
 *
 * Responsibilities:
 * - Markdown rendering for the profile panel
 * - Plain-text rendering for copy/export
 * - Pretty-printed JSON rendering
 * - Fact sheet rows for the selected dataset row
 */

import type { Dossier, SelectionContext } from '../types/index.js';

const NOT_AVAILABLE = 'N/A';

// ============================================================================
// Helpers
// ============================================================================

function orNotAvailable(value: string | number | null): string {
  if (value === null || value === '') {
    return NOT_AVAILABLE;
  }
  return String(value);
}

function formatLocation(dossier: Dossier): string {
  const parts = [dossier.location.city, dossier.location.country].filter(
    (part): part is string => part !== null && part.length > 0
  );
  return parts.length > 0 ? parts.join(', ') : NOT_AVAILABLE;
}

function formatCount(value: number | null): string {
  return value === null ? NOT_AVAILABLE : value.toLocaleString('en-US');
}

// ============================================================================
// Markdown
// ============================================================================

/**
 * Render the full dossier as Markdown
 */
export function renderDossierAsMarkdown(dossier: Dossier): string {
  const lines: string[] = [];

  lines.push(`# ${dossier.identity.entity_name}`);
  lines.push('');
  lines.push(`- **Location:** ${formatLocation(dossier)}`);
  lines.push(`- **Opened:** ${orNotAvailable(dossier.opened_year)}`);
  lines.push('');

  lines.push('## History');
  lines.push('');
  lines.push(dossier.history_summary || NOT_AVAILABLE);
  lines.push('');

  if (dossier.timeline.length > 0) {
    lines.push('### Timeline');
    lines.push('');
    for (const event of dossier.timeline) {
      lines.push(`- **${orNotAvailable(event.year)}:** ${event.event}`);
    }
    lines.push('');
  }

  lines.push('## Ownership and Operations');
  lines.push('');
  lines.push(orNotAvailable(dossier.ownership_and_operations));
  lines.push('');

  lines.push('## Scale and Usage');
  lines.push('');
  lines.push(orNotAvailable(dossier.scale_and_usage));
  lines.push('');

  lines.push('## Perception');
  lines.push('');
  lines.push(dossier.perception.summary);
  lines.push('');
  lines.push(`- **Safety:** ${orNotAvailable(dossier.perception.safety)}`);
  lines.push(`- **Cleanliness:** ${orNotAvailable(dossier.perception.cleanliness)}`);
  lines.push(`- **Typical riders:** ${orNotAvailable(dossier.perception.typical_riders)}`);
  lines.push(`- **Confidence:** ${dossier.perception.confidence}`);
  if (dossier.perception.notes) {
    lines.push('');
    lines.push(`_${dossier.perception.notes}_`);
  }
  lines.push('');

  if (dossier.culture.length > 0) {
    lines.push('## In Culture');
    lines.push('');
    for (const work of dossier.culture) {
      const details = [work.creator, work.year === null ? null : String(work.year), work.medium].filter(
        (part): part is string => part !== null
      );
      const title = work.source_url ? `[${work.work}](${work.source_url})` : work.work;
      lines.push(`- **${title}**${details.length > 0 ? ` (${details.join(', ')})` : ''}: ${work.relevance}`);
    }
    lines.push('');
  }

  lines.push('## Sources');
  lines.push('');
  if (dossier.sources.length === 0) {
    lines.push('No web sources were used for this profile.');
  } else {
    dossier.sources.forEach((source, i) => {
      lines.push(`${i + 1}. [${source.title}](${source.url})`);
    });
  }

  return lines.join('\n');
}

// ============================================================================
// Plain text
// ============================================================================

/**
 * Render the dossier as plain text, no Markdown syntax
 */
export function renderDossierAsPlainText(dossier: Dossier): string {
  const lines: string[] = [];

  lines.push(dossier.identity.entity_name.toUpperCase());
  lines.push(`Location: ${formatLocation(dossier)}`);
  lines.push(`Opened: ${orNotAvailable(dossier.opened_year)}`);
  lines.push('');

  lines.push('HISTORY');
  lines.push(dossier.history_summary || NOT_AVAILABLE);
  for (const event of dossier.timeline) {
    lines.push(`  ${orNotAvailable(event.year)} - ${event.event}`);
  }
  lines.push('');

  lines.push('OWNERSHIP AND OPERATIONS');
  lines.push(orNotAvailable(dossier.ownership_and_operations));
  lines.push('');

  lines.push('SCALE AND USAGE');
  lines.push(orNotAvailable(dossier.scale_and_usage));
  lines.push('');

  lines.push(`PERCEPTION (confidence: ${dossier.perception.confidence})`);
  lines.push(dossier.perception.summary);
  lines.push('');

  if (dossier.culture.length > 0) {
    lines.push('IN CULTURE');
    for (const work of dossier.culture) {
      lines.push(`  ${work.work}: ${work.relevance}`);
    }
    lines.push('');
  }

  lines.push('SOURCES');
  if (dossier.sources.length === 0) {
    lines.push('  none');
  } else {
    for (const source of dossier.sources) {
      lines.push(`  ${source.title} <${source.url}>`);
    }
  }

  return lines.join('\n');
}

// ============================================================================
// JSON
// ============================================================================

export function renderDossierAsJSON(dossier: Dossier): string {
  return JSON.stringify(dossier, null, 2);
}

// ============================================================================
// Fact sheet
// ============================================================================

export interface FactRow {
  field: string;
  value: string;
}

/**
 * Field/value rows describing the selected system, as shown beside the map
 */
export function renderFactSheet(context: SelectionContext): FactRow[] {
  const { facts } = context;
  const visited = facts.visited === null ? NOT_AVAILABLE : facts.visited ? 'Yes' : 'No';

  return [
    { field: 'System', value: context.entityName },
    { field: 'City', value: orNotAvailable(context.city) },
    { field: 'Country', value: orNotAvailable(context.country) },
    { field: 'Opened', value: orNotAvailable(facts.openedYear) },
    { field: 'Lines', value: formatCount(facts.numberOfLines) },
    { field: 'Length (miles)', value: orNotAvailable(facts.totalMiles) },
    { field: 'Stations', value: formatCount(facts.stations) },
    { field: 'Annual ridership', value: formatCount(facts.annualRidership) },
    { field: 'City population', value: formatCount(facts.cityPopulation) },
    { field: 'Last major expansion', value: orNotAvailable(facts.lastMajorUpdate) },
    { field: 'Visited', value: visited },
  ];
}
