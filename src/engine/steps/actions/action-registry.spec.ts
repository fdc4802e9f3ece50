import { loadEngineConfig } from '../../../config/engine.config';
import { UnknownActionError } from '../../errors';
import { ActionRegistryService } from './action-registry.service';
import { CacheAction } from './cache.action';
import { CheckoutAction } from './checkout.action';
import { ToolchainAction } from './toolchain.action';

describe('ActionRegistryService', () => {
  const config = loadEngineConfig({});
  const checkout = new CheckoutAction(config);
  const toolchain = new ToolchainAction(config);
  const cache = new CacheAction();
  const registry = new ActionRegistryService([checkout, toolchain, cache]);

  it('resolves a reference by name and version', () => {
    expect(registry.find({ name: 'actions/checkout', version: 'v3' })).toBe(checkout);
    expect(registry.find({ name: 'Swatinem/rust-cache', version: 'v2' })).toBe(cache);
  });

  it('matches any version of a wildcard address', () => {
    expect(registry.find({ name: 'dtolnay/rust-toolchain', version: 'nightly' })).toBe(toolchain);
    expect(registry.find({ name: 'dtolnay/rust-toolchain', version: '1.75.0' })).toBe(toolchain);
  });

  it('does not resolve a version the handler does not answer to', () => {
    expect(registry.find({ name: 'actions/checkout', version: 'v1' })).toBeNull();
    expect(() => registry.resolve({ name: 'actions/checkout', version: 'v1' })).toThrow(
      new UnknownActionError({ name: 'actions/checkout', version: 'v1' }),
    );
  });

  it('rejects unknown actions with the reference in the message', () => {
    expect(() => registry.resolve({ name: 'codecov/codecov-action', version: 'v3' })).toThrow(
      'Unknown action: codecov/codecov-action@v3',
    );
  });

  it('lists every address it answers to', () => {
    expect(registry.listAddresses()).toEqual([
      'actions/checkout@v2|v3|v4',
      'dtolnay/rust-toolchain@*',
      'actions/setup-toolchain@v1',
      'Swatinem/rust-cache@v1|v2',
      'actions/cache@v3|v4',
    ]);
  });
});

describe('CacheAction.cacheSettings', () => {
  const cache = new CacheAction();

  it('derives rust settings from prefix-key and cache-directories', () => {
    expect(
      cache.cacheSettings({
        kind: 'action',
        uses: { name: 'Swatinem/rust-cache', version: 'v2' },
        with: { 'prefix-key': 'v1-rust', 'cache-directories': 'vendor, .cargo-home' },
        env: {},
      }),
    ).toEqual({
      key: 'v1-rust-{runner}-{fingerprint}',
      paths: ['target', 'vendor', '.cargo-home'],
      fingerprint: ['Cargo.lock', 'Cargo.toml'],
    });
  });

  it('takes path and key from actions/cache', () => {
    expect(
      cache.cacheSettings({
        kind: 'action',
        uses: { name: 'actions/cache', version: 'v4' },
        with: { path: '~/.npm\nnode_modules', key: 'npm-{fingerprint}' },
        env: {},
      }),
    ).toEqual({ paths: ['~/.npm', 'node_modules'], key: 'npm-{fingerprint}' });
  });
});
