/**
 * **Property 5: Applicability Fails Open**
 *
 * Whatever goes wrong with the classifier, every required control stays
 * applicable and the run is flagged as degraded. When the classifier does
 * answer, the applicable and excluded controls partition the required set.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fc from 'fast-check';
import { ApplicabilityResolver } from '../../services/applicability-resolver.js';
import { Logger } from '../../services/logger.js';
import { IApplicabilityClassifier } from '../../interfaces/index.js';
import { FailingClassifier, FixedResponseClassifier, StubClassifier } from '../fixtures/collaborators.js';
import { controlSetGenerator, reasonGenerator } from '../generators/index.js';

const propertyConfig = {
  numRuns: 100,
  verbose: false
};

const failingClassifierGenerator = (): fc.Arbitrary<IApplicabilityClassifier> =>
  fc.oneof(
    fc.string().map(message => new FailingClassifier(message)),
    fc
      .oneof(
        fc.string(),
        fc.integer(),
        fc.constant(null),
        fc.array(fc.string()),
        fc.constant({}),
        fc.record({ notApplicable: fc.string() }),
        fc.record({ applicable: fc.array(fc.record({ controlId: fc.integer() }), { minLength: 1 }) })
      )
      .map(response => new FixedResponseClassifier(response))
  );

describe('Property 5: Applicability Fails Open', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const logger = new Logger('property', 'WARN');

  it('should keep every control applicable when the classifier fails', async () => {
    await fc.assert(
      fc.asyncProperty(controlSetGenerator(), failingClassifierGenerator(), async (controls, classifier) => {
        const resolution = await new ApplicabilityResolver(classifier, logger, { timeoutMs: 1000 }).resolve(
          'context',
          controls
        );

        expect(resolution.applicable).toEqual(controls);
        expect(resolution.notApplicable).toEqual([]);
        expect(resolution.degraded).toBe(true);
        expect(resolution.notes).toHaveLength(1);
        expect(resolution.notes[0].startsWith('Applicability assessment failed: ')).toBe(true);
      }),
      propertyConfig
    );
  });

  it('should partition the required controls when the classifier answers', async () => {
    const scenarioGenerator = controlSetGenerator().chain(controls =>
      fc.record({
        controls: fc.constant(controls),
        excluded: fc.subarray(controls.map(c => c.id)),
        reason: reasonGenerator(),
      })
    );

    await fc.assert(
      fc.asyncProperty(scenarioGenerator, async ({ controls, excluded, reason }) => {
        const exclusions = Object.fromEntries(excluded.map(id => [id, reason]));
        const resolution = await new ApplicabilityResolver(new StubClassifier(exclusions), logger, {
          timeoutMs: 1000,
        }).resolve('context', controls);

        const applicableIds = resolution.applicable.map(c => c.id);
        const excludedIds = resolution.notApplicable.map(d => d.controlId);
        expect([...applicableIds, ...excludedIds].sort()).toEqual(controls.map(c => c.id).sort());
        expect(excludedIds.slice().sort()).toEqual(excluded.slice().sort());
        expect(resolution.degraded).toBe(false);
      }),
      propertyConfig
    );
  });
});
