/**
 * Unit tests for Path Utilities
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import {
  expandPath,
  getDefaultStateDir,
  getHandoffDir,
  getLockPath,
  getRecordPath,
} from '../../../src/lib/paths.js';

describe('expandPath', () => {
  describe('tilde expansion', () => {
    it('should expand ~ to home directory', () => {
      assert.strictEqual(expandPath('~', '/base'), homedir());
    });

    it('should expand ~/path to home directory path', () => {
      assert.strictEqual(expandPath('~/some/path', '/base'), join(homedir(), 'some/path'));
    });

    it('should leave ~user untouched apart from base resolution', () => {
      assert.strictEqual(expandPath('~other/x', '/base'), resolve('/base', '~other/x'));
    });
  });

  describe('relative path resolution', () => {
    it('should resolve relative path against base path', () => {
      const basePath = resolve('/project/config');

      assert.strictEqual(expandPath('relative/file.txt', basePath), resolve(basePath, 'relative/file.txt'));
    });

    it('should preserve absolute paths', () => {
      assert.strictEqual(expandPath('/absolute/path', '/base'), '/absolute/path');
    });

    it('should resolve .. as parent directory', () => {
      assert.strictEqual(expandPath('..', '/project/config'), '/project');
    });
  });

  describe('environment variable expansion', () => {
    let original: string | undefined;

    beforeEach(() => {
      original = process.env['GUESTSMITH_TEST_DIR'];
      process.env['GUESTSMITH_TEST_DIR'] = '/srv/guests';
    });

    afterEach(() => {
      if (original === undefined) {
        delete process.env['GUESTSMITH_TEST_DIR'];
      } else {
        process.env['GUESTSMITH_TEST_DIR'] = original;
      }
    });

    it('should expand $VAR', () => {
      assert.strictEqual(expandPath('$GUESTSMITH_TEST_DIR/state', '/base'), '/srv/guests/state');
    });

    it('should expand ${VAR}', () => {
      assert.strictEqual(expandPath('${GUESTSMITH_TEST_DIR}/state', '/base'), '/srv/guests/state');
    });

    it('should expand unset variables to empty strings', () => {
      assert.strictEqual(expandPath('$GUESTSMITH_UNSET_VAR_X/state', '/base'), '/state');
    });
  });
});

describe('state paths', () => {
  it('should place the default state dir next to the config file', () => {
    assert.strictEqual(getDefaultStateDir('/etc/guestsmith/host.yaml'), '/etc/guestsmith/.guestsmith/state');
  });

  it('should name record files by id', () => {
    assert.strictEqual(getRecordPath('/var/state', 101), '/var/state/101.json');
  });

  it('should keep the lock and handoff files inside the state dir', () => {
    assert.strictEqual(getLockPath('/var/state'), '/var/state/.lock');
    assert.strictEqual(getHandoffDir('/var/state'), '/var/state/handoff');
  });
});
