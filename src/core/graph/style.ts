/**
 * Package-organization style detection.
 *
 * Counts types whose package (relative to the base package) contains a
 * style's marker segments, weighs the counts and picks the best style.
 */
import type { GraphMetadata, PackageOrganizationStyle, TypeNode } from './types.js';

interface StyleMarker {
  pattern: string;
  style: Exclude<PackageOrganizationStyle, 'UNKNOWN'>;
  weight: number;
}

// Order matters: on equal scores the earlier style wins.
const STYLE_MARKERS: readonly StyleMarker[] = [
  { pattern: '.ports.in', style: 'HEXAGONAL', weight: 2 },
  { pattern: '.ports.out', style: 'HEXAGONAL', weight: 2 },
  { pattern: '.adapters', style: 'HEXAGONAL', weight: 2 },
  { pattern: '.adapter', style: 'HEXAGONAL', weight: 2 },
  { pattern: '.inbound', style: 'HEXAGONAL', weight: 1 },
  { pattern: '.outbound', style: 'HEXAGONAL', weight: 1 },
  { pattern: '.usecases', style: 'CLEAN_ARCHITECTURE', weight: 2 },
  { pattern: '.usecase', style: 'CLEAN_ARCHITECTURE', weight: 2 },
  { pattern: '.gateways', style: 'CLEAN_ARCHITECTURE', weight: 2 },
  { pattern: '.entities', style: 'CLEAN_ARCHITECTURE', weight: 2 },
  { pattern: '.core', style: 'ONION', weight: 2 },
  { pattern: '.domain', style: 'BY_LAYER', weight: 1 },
  { pattern: '.application', style: 'BY_LAYER', weight: 1 },
  { pattern: '.infrastructure', style: 'BY_LAYER', weight: 1 },
  { pattern: '.presentation', style: 'BY_LAYER', weight: 1 },
];

export type StyleConfidence = GraphMetadata['styleConfidence'];

export interface StyleDetectionResult {
  style: PackageOrganizationStyle;
  confidence: StyleConfidence;
  /** Marker pattern -> number of types whose package contains it */
  detectedPatterns: Record<string, number>;
  /** Sum of all pattern counts */
  totalMatches: number;
}

/**
 * True when `packageName` contains `pattern` as whole segments.
 */
function containsSegments(packageName: string, pattern: string): boolean {
  const padded = `.${packageName}`;
  return padded.endsWith(pattern) || padded.includes(`${pattern}.`);
}

export class StyleDetector {
  detect(types: readonly TypeNode[], basePackage = ''): StyleDetectionResult {
    if (types.length === 0) {
      return { style: 'UNKNOWN', confidence: 'LOW', detectedPatterns: {}, totalMatches: 0 };
    }

    const detectedPatterns: Record<string, number> = {};
    const scores = new Map<PackageOrganizationStyle, number>();
    let totalMatches = 0;
    let totalScore = 0;

    for (const type of types) {
      const relative = relativePackage(type.packageName, basePackage);
      for (const marker of STYLE_MARKERS) {
        if (containsSegments(relative, marker.pattern)) {
          detectedPatterns[marker.pattern] = (detectedPatterns[marker.pattern] ?? 0) + 1;
          scores.set(marker.style, (scores.get(marker.style) ?? 0) + marker.weight);
          totalMatches++;
          totalScore += marker.weight;
        }
      }
    }

    let best: PackageOrganizationStyle = 'UNKNOWN';
    let bestScore = 0;
    for (const marker of STYLE_MARKERS) {
      const score = scores.get(marker.style) ?? 0;
      if (score > bestScore) {
        best = marker.style;
        bestScore = score;
      }
    }

    if (best === 'UNKNOWN') {
      return { style: 'UNKNOWN', confidence: 'LOW', detectedPatterns, totalMatches };
    }
    return {
      style: best,
      confidence: confidenceFor(bestScore / totalScore, types.length),
      detectedPatterns,
      totalMatches,
    };
  }
}

function confidenceFor(share: number, typeCount: number): StyleConfidence {
  if (share >= 0.75 && typeCount >= 5) return 'HIGH';
  if (share >= 0.5) return 'MEDIUM';
  return 'LOW';
}

function relativePackage(packageName: string, basePackage: string): string {
  if (basePackage && packageName.startsWith(`${basePackage}.`)) {
    return packageName.slice(basePackage.length + 1);
  }
  if (packageName === basePackage) {
    return '';
  }
  return packageName;
}
