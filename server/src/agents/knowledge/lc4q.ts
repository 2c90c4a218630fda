/**
 * Knowledge: LC4Q leadership competency framework
 *
 * Every example targets one area; the items listed for that area are what the
 * matching competency collaborator must confirm before the example converges.
 * A position may narrow the list for its own advertisement.
 */

import { COMPETENCY_AREAS, type CompetencyArea } from '../runtime/agent-protocol.js';

export type CompetencyFramework = Readonly<Record<CompetencyArea, readonly string[]>>;

export const LC4Q_FRAMEWORK: CompetencyFramework = {
  vision: [
    'Leads strategically',
    'Stimulates ideas and innovation',
    'Leads change in complex environments',
    'Makes insightful decisions',
  ],
  results: [
    'Develops and mobilises talent',
    'Builds enduring relationships',
    'Inspires others',
    'Drives accountability and outcomes',
  ],
  accountability: [
    'Fosters healthy and inclusive workplaces',
    'Pursues continuous growth',
    'Demonstrates sound governance',
  ],
};

/**
 * Framework as advertised for one position: areas the position lists
 * explicitly replace the defaults, the rest keep them.
 */
export function frameworkFor(
  overrides?: Partial<Record<CompetencyArea, readonly string[]>>,
): CompetencyFramework {
  const resolved: Record<CompetencyArea, readonly string[]> = { ...LC4Q_FRAMEWORK };
  for (const area of COMPETENCY_AREAS) {
    const listed = overrides?.[area];
    if (listed && listed.length > 0) resolved[area] = [...listed];
  }
  return resolved;
}
