/**
 * Application firewall plugin tests.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { UNKNOWN } from '@provision/types';
import { FirewallExceptions, FirewallFlag, SOCKETFILTERFW, parseAppList, parseToggle } from '@provision/core';
import { FakeCommandRunner, ok } from '../../helpers/FakeCommandRunner.js';
import { ENV, applyContext, entry, pluginContext } from '../../helpers/pluginContext.js';

const LISTAPPS = [
  'ALF: total number of apps = 2 ',
  '',
  '1 :  /usr/libexec/sharingd ',
  ' \t ( Allow incoming connections ) ',
  '',
  '2 :  /Applications/Foo.app ',
  ' \t ( Block incoming connections ) ',
  '',
].join('\n');

describe('parseToggle', () => {
  it('should read the wording of each query', () => {
    assert.strictEqual(parseToggle('Firewall is enabled. (State = 1)\n'), 'on');
    assert.strictEqual(parseToggle('Firewall is disabled. (State = 0)\n'), 'off');
    assert.strictEqual(parseToggle('Firewall stealth mode is on\n'), 'on');
    assert.strictEqual(parseToggle('Stealth mode disabled\n'), 'off');
    assert.strictEqual(parseToggle('Automatically allow signed built-in software ENABLED\n'), 'on');
  });

  it('should count block-all mode as enabled', () => {
    assert.strictEqual(parseToggle('Firewall is set to block all non-essential incoming connections\n'), 'on');
  });

  it('should only look at the first non-empty line', () => {
    assert.strictEqual(parseToggle('\nFirewall is enabled. (State = 1)\nStealth mode off\n'), 'on');
  });

  it('should return UNKNOWN for empty or unrecognised output', () => {
    assert.strictEqual(parseToggle(''), UNKNOWN);
    assert.strictEqual(parseToggle('Usage: socketfilterfw <options>\n'), UNKNOWN);
  });
});

describe('parseAppList', () => {
  it('should pair each app with its allow/block line', () => {
    assert.deepStrictEqual(parseAppList(LISTAPPS), [
      { path: '/usr/libexec/sharingd', allowed: true },
      { path: '/Applications/Foo.app', allowed: false },
    ]);
  });

  it('should return an empty list when no apps are registered', () => {
    assert.deepStrictEqual(parseAppList('ALF: total number of apps = 0 \n'), []);
  });
});

describe('FirewallFlag', () => {
  it('should use the flag-specific get and set switches', async () => {
    const runner = new FakeCommandRunner()
      .on(`${SOCKETFILTERFW} --getstealthmode`, ok('Firewall stealth mode is off\n'))
      .on(`${SOCKETFILTERFW} --setstealthmode on`, ok('Stealth mode enabled\n'));
    const plugin = new FirewallFlag(entry('firewall-stealth'), ENV, 'firewall-stealth');

    assert.strictEqual(await plugin.probe(pluginContext(runner)), 'off');
    await plugin.apply('on', applyContext(runner, 'off'));

    assert.deepStrictEqual(runner.calls, [
      `${SOCKETFILTERFW} --getstealthmode`,
      `${SOCKETFILTERFW} --setstealthmode on`,
    ]);
  });

  it('should name the global state resource firewall-enabled', () => {
    const descriptor = new FirewallFlag(entry('firewall-state'), ENV, 'firewall-state').toDescriptor();

    assert.strictEqual(descriptor.id, 'firewall-enabled');
    assert.strictEqual(descriptor.type, 'firewall-state');
    assert.strictEqual(descriptor.desired, 'on');
    assert.strictEqual(descriptor.requiredPrivilege, 'root');
  });

  it('should accept another socketfilterfw path', async () => {
    const runner = new FakeCommandRunner().on('/opt/fw/socketfilterfw --getallowsigned', ok('Automatically allow signed built-in software ENABLED\n'));
    const plugin = new FirewallFlag(
      entry('firewall-allow-signed', { options: { socketfilterfw: '/opt/fw/socketfilterfw' } }),
      ENV,
      'firewall-allow-signed'
    );

    assert.strictEqual(await plugin.probe(pluginContext(runner)), 'on');
  });
});

describe('FirewallExceptions', () => {
  it('should observe only the allowed apps', async () => {
    const runner = new FakeCommandRunner().on(`${SOCKETFILTERFW} --listapps`, ok(LISTAPPS));
    const plugin = new FirewallExceptions(entry('firewall-exceptions'), ENV);

    assert.deepStrictEqual(await plugin.probe(pluginContext(runner)), ['/usr/libexec/sharingd']);
  });

  it('should add unlisted apps and unblock every missing one', async () => {
    const runner = new FakeCommandRunner()
      .on(`${SOCKETFILTERFW} --listapps`, ok(LISTAPPS))
      .on(`${SOCKETFILTERFW} --add /usr/libexec/rapportd`, ok())
      .on(`${SOCKETFILTERFW} --unblockapp /usr/libexec/rapportd`, ok())
      .on(`${SOCKETFILTERFW} --unblockapp /Applications/Foo.app`, ok());
    const plugin = new FirewallExceptions(entry('firewall-exceptions'), ENV);

    await plugin.apply(
      ['/usr/libexec/sharingd', '/usr/libexec/rapportd', '/Applications/Foo.app'],
      applyContext(runner, ['/usr/libexec/sharingd'])
    );

    assert.deepStrictEqual(runner.calls, [
      `${SOCKETFILTERFW} --listapps`,
      `${SOCKETFILTERFW} --add /usr/libexec/rapportd`,
      `${SOCKETFILTERFW} --unblockapp /usr/libexec/rapportd`,
      `${SOCKETFILTERFW} --unblockapp /Applications/Foo.app`,
    ]);
  });

  it('should expand ~ in desired paths', () => {
    const descriptor = new FirewallExceptions(
      entry('firewall-exceptions', { desired: ['~/go/bin/tailscaled'] }),
      ENV
    ).toDescriptor();

    assert.deepStrictEqual(descriptor.desired, ['/Users/alice/go/bin/tailscaled']);
    assert.strictEqual(descriptor.comparison, 'contains');
  });
});
