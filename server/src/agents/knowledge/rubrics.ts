/**
 * Knowledge: scoring rubrics
 *
 * Opaque text passed to the backend with each scoring turn. The engine only
 * reads the resulting integer score.
 */

import type { ScoringCriterion } from '../runtime/agent-protocol.js';

const SCALE = `Scale (1-7):
- 1-2 Very limited / limited: not relevant to the role
- 3 Basic: some relevance
- 4 Adequate: meets requirements
- 5 Proficient: all elements present
- 6 Very proficient: above the target level
- 7 Advanced: significantly above the target level`;

export const SCORING_RUBRICS: Readonly<Record<ScoringCriterion, string>> = {
  context: `${SCALE}

Judge contextual relevance:
- Direct alignment with the Key Accountability the example targets
- Relevance to the position's location and the community it serves
- Operational priorities reflected
- Transferable skills made explicit where the setting differs`,

  complexity: `${SCALE}

Judge complexity relative to the target rank:
- Stakeholder complexity (internal, external, competing interests)
- Sophistication of problem-solving
- Scale of resources managed
- Timeline pressure, risk and impact
- Degree of decision-making autonomy`,

  initiative: `${SCALE}

Judge proactive leadership:
- Self-initiated rather than assigned work
- Innovation and creative solutions
- Process improvements implemented
- Problems identified before they escalated
- Going beyond what the role required`,
};
