/**
 * Security plugin tests: FileVault and Remote Login.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { UNKNOWN } from '@provision/types';
import { ApplyError, CommandError, FileVault, RemoteLogin, parseFileVaultStatus, parseRemoteLogin } from '@provision/core';
import { FakeCommandRunner, fail, ok } from '../../helpers/FakeCommandRunner.js';
import { ENV, applyContext, entry, pluginContext } from '../../helpers/pluginContext.js';

describe('parseFileVaultStatus', () => {
  it('should read on and off', () => {
    assert.strictEqual(parseFileVaultStatus('FileVault is On.\n'), 'on');
    assert.strictEqual(parseFileVaultStatus('FileVault is Off.\n'), 'off');
  });

  it('should treat a volume that is still decrypting as off', () => {
    const stdout = 'FileVault is On.\nDecryption in progress: Percent completed = 12.3\n';
    assert.strictEqual(parseFileVaultStatus(stdout), 'off');
  });

  it('should return UNKNOWN for unrecognised output', () => {
    assert.strictEqual(parseFileVaultStatus('Error: unable to read status\n'), UNKNOWN);
  });
});

describe('FileVault', () => {
  it('should probe through fdesetup status', async () => {
    const runner = new FakeCommandRunner().on('fdesetup status', ok('FileVault is Off.\n'));
    const plugin = new FileVault(entry('filevault'), ENV);

    assert.strictEqual(await plugin.probe(pluginContext(runner)), 'off');
    assert.deepStrictEqual(runner.calls, ['fdesetup status']);
  });

  it('should throw when fdesetup itself fails', async () => {
    const runner = new FakeCommandRunner().on('fdesetup status', fail(1, 'fdesetup: must be run as root'));
    const plugin = new FileVault(entry('filevault'), ENV);

    await assert.rejects(plugin.probe(pluginContext(runner)), CommandError);
  });

  it('should disable FileVault', async () => {
    const runner = new FakeCommandRunner().on('fdesetup disable', ok());
    const plugin = new FileVault(entry('filevault'), ENV);

    await plugin.apply('off', applyContext(runner, 'on'));

    assert.deepStrictEqual(runner.calls, ['fdesetup disable']);
  });

  it('should refuse to enable FileVault and suggest the manual command', async () => {
    const runner = new FakeCommandRunner();
    const plugin = new FileVault(entry('filevault', { desired: 'on' }), ENV);

    await assert.rejects(plugin.apply('on', applyContext(runner, 'off')), (error: unknown) => {
      assert.ok(error instanceof ApplyError);
      assert.strictEqual(error.suggestion, 'Run: sudo fdesetup enable');
      return true;
    });
    assert.deepStrictEqual(runner.calls, []);
  });
});

describe('parseRemoteLogin', () => {
  it('should read the state case-insensitively', () => {
    assert.strictEqual(parseRemoteLogin('Remote Login: On\n'), 'on');
    assert.strictEqual(parseRemoteLogin('Remote Login: off\n'), 'off');
  });

  it('should return UNKNOWN when access is denied', () => {
    assert.strictEqual(parseRemoteLogin('You need administrator access to run this tool... exiting!\n'), UNKNOWN);
  });
});

describe('RemoteLogin', () => {
  it('should probe and switch remote login off', async () => {
    const runner = new FakeCommandRunner()
      .on('systemsetup -getremotelogin', ok('Remote Login: On\n'))
      .on('systemsetup -f -setremotelogin off', ok());
    const plugin = new RemoteLogin(entry('remote-login'), ENV);

    assert.strictEqual(plugin.toDescriptor().desired, 'off');
    assert.strictEqual(await plugin.probe(pluginContext(runner)), 'on');
    await plugin.apply('off', applyContext(runner, 'on'));

    assert.deepStrictEqual(runner.calls, ['systemsetup -getremotelogin', 'systemsetup -f -setremotelogin off']);
  });
});
