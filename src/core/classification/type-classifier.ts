/**
 * Classifies every type of a graph: interfaces as ports first, everything
 * left over through the domain classifier. A port conflict is kept as is.
 */
import { minimatch } from 'minimatch';
import type { ApplicationGraph } from '../graph/graph.js';
import type { TypeNode } from '../graph/types.js';
import { logger as rootLogger } from '../../utils/logger.js';
import { Contribution } from './contribution.js';
import { decisionPolicyFor, type DecisionPolicyName } from './decision.js';
import { DomainClassifier } from './domain/classifier.js';
import { isDomainKind } from './domain/kinds.js';
import { annotationEvidence } from './evidence.js';
import { PortClassifier } from './port/classifier.js';
import type { PortDirection } from './port/kinds.js';
import { CriteriaProfile } from './profile.js';
import { ClassificationResults, classified } from './result.js';
import type { ClassificationKind, ClassificationResult } from './types.js';

const logger = rootLogger.child('classify');

export const CONFIGURATION_CRITERIA = 'configuration';

const DRIVING_PORT_KINDS: ReadonlySet<string> = new Set(['USE_CASE', 'QUERY', 'COMMAND']);

export interface TypeClassifierOptions {
  profile?: CriteriaProfile;
  decisionPolicy?: DecisionPolicyName;
  /** Glob patterns over qualified names; matching types are skipped */
  exclude?: readonly string[];
  /** Qualified name -> kind, bypassing the criteria */
  explicit?: Readonly<Record<string, ClassificationKind>>;
}

export class TypeClassifier {
  private readonly domain: DomainClassifier;
  private readonly port: PortClassifier;
  private readonly exclude: readonly string[];
  private readonly explicit: Readonly<Record<string, ClassificationKind>>;

  constructor(options: TypeClassifierOptions = {}) {
    const profile = options.profile ?? CriteriaProfile.legacy();
    const policy = options.decisionPolicy ?? 'default';
    this.domain = new DomainClassifier({ profile, decisionPolicy: decisionPolicyFor(policy) });
    this.port = new PortClassifier({ profile, decisionPolicy: decisionPolicyFor(policy) });
    this.exclude = options.exclude ?? [];
    this.explicit = options.explicit ?? {};
  }

  classify(graph: ApplicationGraph): ClassificationResults {
    const query = graph.query();
    const results = new ClassificationResults();
    let excluded = 0;

    for (const type of graph.typeNodes()) {
      if (this.isExcluded(type)) {
        excluded++;
        continue;
      }
      const configured = this.explicit[type.qualifiedName];
      if (configured) {
        results.add(explicitResult(type, configured));
        continue;
      }
      if (type.form === 'INTERFACE') {
        const portResult = this.port.classify(type, query);
        if (portResult.status !== 'UNCLASSIFIED') {
          results.add(portResult);
          continue;
        }
      }
      results.add(this.domain.classify(type, query));
    }

    const stats = results.stats();
    logger.info(`Classified ${stats.classified} of ${graph.typeCount} types`, {
      unclassified: stats.unclassified,
      conflicts: stats.conflicts,
      excluded,
    });
    return results;
  }

  private isExcluded(type: TypeNode): boolean {
    return this.exclude.some((pattern) => minimatch(type.qualifiedName, pattern));
  }
}

function explicitResult(type: TypeNode, kind: ClassificationKind): ClassificationResult {
  const winner = Contribution.of<ClassificationKind>(
    kind,
    CONFIGURATION_CRITERIA,
    Number.MAX_SAFE_INTEGER,
    'EXPLICIT',
    `Configured as ${kind}`,
    [annotationEvidence('Explicit configuration entry', [type.id])]
  );
  if (isDomainKind(kind)) {
    return classified(type.id, 'DOMAIN', winner);
  }
  const direction: PortDirection = DRIVING_PORT_KINDS.has(kind) ? 'DRIVING' : 'DRIVEN';
  return classified(type.id, 'PORT', winner, [], direction);
}
