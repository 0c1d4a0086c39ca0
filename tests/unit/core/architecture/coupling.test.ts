/**
 * Tests for package coupling metrics and main-sequence zones.
 */
import { describe, it, expect } from 'vitest';
import {
  analyzeAllPackageCoupling,
  analyzePackageCoupling,
  distanceFromMainSequence,
  instability,
  isProblematic,
  zoneOf,
} from '../../../../src/core/architecture/coupling.js';
import type { CouplingMetrics } from '../../../../src/core/architecture/types.js';
import { buildGraph, classDecl, interfaceDecl } from '../../../helpers/source-model.js';

const metrics = (afferentCoupling: number, efferentCoupling: number, abstractness: number): CouplingMetrics => ({
  packageName: 'com.acme.pkg',
  afferentCoupling,
  efferentCoupling,
  abstractness,
});

describe('package coupling', () => {
  const graph = buildGraph([
    interfaceDecl('com.acme.core.Port'),
    classDecl('com.acme.core.Model'),
    classDecl('com.acme.app.Service', {
      fields: [
        { name: 'port', type: 'com.acme.core.Port' },
        { name: 'model', type: 'com.acme.core.Model' },
      ],
    }),
    classDecl('com.acme.app.Main', { fields: [{ name: 'service', type: 'com.acme.app.Service' }] }),
  ]);

  describe('analyzePackageCoupling', () => {
    it('should count distinct outside types on each side', () => {
      expect(analyzePackageCoupling(graph, 'com.acme.core')).toEqual({
        packageName: 'com.acme.core',
        afferentCoupling: 1,
        efferentCoupling: 0,
        abstractness: 0.5,
      });
      expect(analyzePackageCoupling(graph, 'com.acme.app')).toEqual({
        packageName: 'com.acme.app',
        afferentCoupling: 0,
        efferentCoupling: 2,
        abstractness: 0,
      });
    });

    it('should return zeros for unknown packages', () => {
      expect(analyzePackageCoupling(graph, 'com.acme.none')).toEqual({
        packageName: 'com.acme.none',
        afferentCoupling: 0,
        efferentCoupling: 0,
        abstractness: 0,
      });
    });
  });

  describe('analyzeAllPackageCoupling', () => {
    it('should cover every package sorted by name', () => {
      expect(analyzeAllPackageCoupling(graph).map((m) => m.packageName)).toEqual(['com.acme.app', 'com.acme.core']);
    });
  });
});

describe('derived metrics', () => {
  describe('instability', () => {
    it('should be Ce over Ca plus Ce', () => {
      expect(instability(metrics(1, 3, 0))).toBe(0.75);
    });

    it('should be 0 without any coupling', () => {
      expect(instability(metrics(0, 0, 0))).toBe(0);
    });
  });

  describe('distanceFromMainSequence', () => {
    it('should be |A + I - 1|', () => {
      expect(distanceFromMainSequence(metrics(1, 0, 0.5))).toBe(0.5);
      expect(distanceFromMainSequence(metrics(0, 2, 0))).toBe(0);
    });
  });

  describe('zoneOf', () => {
    it.each([
      [metrics(5, 0, 0), 'ZONE_OF_PAIN'],
      [metrics(0, 5, 1), 'ZONE_OF_USELESSNESS'],
      [metrics(1, 1, 0.5), 'MAIN_SEQUENCE'],
      [metrics(1, 1, 0.3), 'NEAR_MAIN_SEQUENCE'],
      [metrics(1, 1, 0.9), 'OFF_MAIN_SEQUENCE'],
      [metrics(1, 0, 0.5), 'OFF_MAIN_SEQUENCE'],
    ])('should classify %o as %s', (input, zone) => {
      expect(zoneOf(input)).toBe(zone);
    });
  });

  describe('isProblematic', () => {
    it('should flag the pain and uselessness zones only', () => {
      expect(isProblematic(metrics(5, 0, 0))).toBe(true);
      expect(isProblematic(metrics(0, 5, 1))).toBe(true);
      expect(isProblematic(metrics(1, 1, 0.5))).toBe(false);
    });
  });
});
