/**
 * End-to-end analysis: source model -> graph -> classifications ->
 * architecture query.
 */
import * as path from 'node:path';
import { logger } from '../utils/logger.js';
import { DefaultArchitectureQuery } from './architecture/architecture-query.js';
import { CriteriaProfile, loadYamlProfile } from './classification/profile.js';
import type { ClassificationResults } from './classification/result.js';
import { TypeClassifier } from './classification/type-classifier.js';
import { getDefaultConfig, loadConfig } from './config/loader.js';
import type { Config } from './config/schema.js';
import { GraphBuilder } from './graph/builder.js';
import type { ApplicationGraph } from './graph/graph.js';
import { loadSourceModel } from './model/loader.js';
import type { SourceModel } from './model/schema.js';

export interface AnalysisResult {
  graph: ApplicationGraph;
  classifications: ClassificationResults;
  architecture: DefaultArchitectureQuery;
}

export interface AnalyzeOptions {
  config?: Config;
  /** Profile loaded from `classification.profile`; inline priorities apply on top */
  profile?: CriteriaProfile;
}

/**
 * Run the in-memory part of the pipeline.
 */
export function analyzeModel(model: SourceModel, options: AnalyzeOptions = {}): AnalysisResult {
  const config = options.config ?? getDefaultConfig();

  const graph = new GraphBuilder({
    containerTypes: {
      collections: config.graph.collection_types,
      optionals: config.graph.optional_types,
    },
  }).build(model);

  const profile = (options.profile ?? CriteriaProfile.legacy()).withOverrides(config.classification.priorities);
  const classifications = new TypeClassifier({
    profile,
    decisionPolicy: config.classification.decision_policy,
    exclude: config.classification.exclude,
    explicit: config.classification.explicit,
  }).classify(graph);

  const architecture = new DefaultArchitectureQuery(graph, {
    classifications,
    layers: config.analysis.layers,
  });

  return { graph, classifications, architecture };
}

/**
 * Load config, profile and source model from disk, then analyze.
 */
export async function runAnalysis(
  projectRoot: string,
  modelPath: string,
  configPath?: string
): Promise<AnalysisResult> {
  const config = await loadConfig(projectRoot, configPath);
  logger.setLevel(config.log_level);

  const profile = config.classification.profile
    ? await loadYamlProfile(path.resolve(projectRoot, config.classification.profile))
    : undefined;
  const model = await loadSourceModel(path.resolve(projectRoot, modelPath));

  return analyzeModel(model, { config, profile });
}
