/**
 * Unit tests for the CLI output layer (JSON mode) and id parsing
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { OutputFormatter } from '../../../src/cli/output.js';
import { parseIds } from '../../../src/cli/runtime.js';
import { ConfigError, FeatureError } from '../../../src/core/errors.js';

describe('parseIds', () => {
  it('should parse positive integers', () => {
    assert.deepStrictEqual(parseIds(['101', '2001']), [101, 2001]);
  });

  it('should reject anything else', () => {
    for (const bad of ['0', '-1', '10a', '1.5', '']) {
      assert.throws(
        () => parseIds([bad]),
        (error: unknown) => error instanceof ConfigError && error.message === `Invalid resource id: ${bad}`
      );
    }
  });
});

describe('OutputFormatter (JSON mode)', () => {
  it('should collect terminal events as resources', () => {
    const output = new OutputFormatter('up', { json: true });

    output.progress({ type: 'resource-start', id: 101, name: 'web', stage: 'undefined' });
    output.progress({ type: 'stage-start', id: 101, stage: 'defined' });
    output.progress({ type: 'resource-complete', id: 101 });
    output.progress({
      type: 'resource-failed',
      id: 102,
      stage: 'customizing',
      error: new FeatureError("Feature 'nginx' failed for 102: exit 1", 'nginx'),
    });
    output.progress({ type: 'resource-blocked', id: 103, blockedBy: [102] });

    assert.deepStrictEqual(output.getResult().resources, [
      { id: 101, status: 'completed', stage: 'completed' },
      {
        id: 102,
        status: 'failed',
        stage: 'customizing',
        error: { code: 'FEATURE_FAILED', message: "Feature 'nginx' failed for 102: exit 1" },
      },
      { id: 103, status: 'blocked', blockedBy: [102] },
    ]);
  });

  it('should fail the command unless every resource completed', () => {
    const output = new OutputFormatter('up', { json: true });

    output.batchSummary({
      order: [101, 102],
      results: [
        { id: 101, status: 'completed', stage: 'completed' },
        { id: 102, status: 'blocked', blockedBy: [101] },
      ],
      summary: { completed: 1, failed: 0, blocked: 1, cancelled: 0 },
    });

    assert.strictEqual(output.getResult().success, false);
    assert.deepStrictEqual(output.getResult().order, [101, 102]);
    assert.strictEqual(output.getExitCode(), 1);
  });

  it('should record validation results', () => {
    const output = new OutputFormatter('validate', { json: true });

    output.validationSuccess(2, 1, [101, 201, 102]);

    assert.deepStrictEqual(output.getResult(), {
      success: true,
      command: 'validate',
      order: [101, 201, 102],
      summary: { containers: 2, vms: 1 },
    });
  });

  it('should mark dry runs', () => {
    const output = new OutputFormatter('up', { json: true });

    output.setDryRun(true);

    assert.strictEqual(output.getResult().dryRun, true);
    assert.strictEqual(output.getExitCode(), 0);
  });
});
