/**
 * Tests for `provision list`
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { DEFAULT_CONFIG, buildResources } from '@provision/core';
import { formatResourceList, listResources } from '../src/commands/list.js';
import type { ListedResource } from '../src/commands/list.js';

const ENV = { home: '/Users/alice', configDir: '/Users/alice' };

describe('listResources', () => {
  const listed = listResources(buildResources(DEFAULT_CONFIG.resources, ENV));

  it('should number resources in reconciliation order', () => {
    assert.strictEqual(listed.length, 15);
    assert.deepStrictEqual(listed[0], {
      position: 1,
      id: 'homebrew',
      type: 'homebrew',
      privilege: 'root',
      desired: 'installed',
      dependsOn: [],
      prerequisites: [],
    });
    assert.deepStrictEqual(listed.map(r => r.id).slice(-2), ['firewall-exceptions', 'tailscale-connection']);
  });

  it('should show transitive prerequisites nearest first', () => {
    const connection = listed.find(r => r.id === 'tailscale-connection');
    assert.deepStrictEqual(connection?.prerequisites, ['tailscale-daemon', 'tailscale-binaries', 'go', 'homebrew']);
  });

  it('should render list states with ~ expanded', () => {
    const exceptions = listed.find(r => r.id === 'firewall-exceptions');
    assert.ok(exceptions?.desired.startsWith('[/Users/alice/go/bin/tailscaled, '));
  });
});

describe('formatResourceList', () => {
  it('should align columns and name direct dependencies', () => {
    const resources: ListedResource[] = [
      { position: 1, id: 'homebrew', type: 'homebrew', privilege: 'root', desired: 'installed', dependsOn: [], prerequisites: [] },
      {
        position: 2,
        id: 'go',
        type: 'brew-formula',
        privilege: 'user',
        desired: 'installed',
        dependsOn: ['homebrew'],
        prerequisites: ['homebrew'],
      },
    ];

    assert.strictEqual(
      formatResourceList(resources),
      '1. homebrew  homebrew      root  installed\n' +
        '2. go        brew-formula  user  installed  after homebrew'
    );
  });

  it('should render nothing for an empty list', () => {
    assert.strictEqual(formatResourceList([]), '');
  });
});
