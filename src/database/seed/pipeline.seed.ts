import type { ActionStep, PipelineDeclaration } from '../../declaration/declaration.types';

const checkout: ActionStep = {
  kind: 'action',
  name: 'Checkout repository',
  uses: { name: 'actions/checkout', version: 'v3' },
  with: {},
  env: {},
};

const rustCache: ActionStep = {
  kind: 'action',
  uses: { name: 'Swatinem/rust-cache', version: 'v2' },
  with: {},
  env: {},
};

function rustToolchain(components?: string): ActionStep {
  return {
    kind: 'action',
    name: 'Install Rust toolchain',
    uses: { name: 'dtolnay/rust-toolchain', version: 'stable' },
    with: components ? { components } : {},
    env: {},
  };
}

/**
 * Example pipeline inserted on first app start when no pipelines exist:
 * five independent verification jobs for a cargo project.
 */
export const RUST_CI_SEED: { name: string; repository: string; pipeline: PipelineDeclaration } = {
  name: 'rust-library',
  repository: 'https://github.com/example/rust-library',
  pipeline: {
    name: 'CI',
    triggers: ['push', 'pull_request'],
    env: { CARGO_TERM_COLOR: 'always' },
    failFast: false,
    jobs: [
      {
        id: 'test',
        name: 'Test',
        runsOn: 'ubuntu-latest',
        env: {},
        continueOnError: false,
        steps: [
          checkout,
          rustToolchain(),
          rustCache,
          { kind: 'command', name: 'Run tests', run: 'cargo test --all-features', env: {} },
        ],
      },
      {
        id: 'fmt',
        name: 'Rustfmt',
        runsOn: 'ubuntu-latest',
        env: {},
        continueOnError: false,
        steps: [
          checkout,
          rustToolchain('rustfmt'),
          rustCache,
          { kind: 'command', name: 'Check formatting', run: 'cargo fmt --all -- --check', env: {} },
        ],
      },
      {
        id: 'clippy',
        name: 'Clippy',
        runsOn: 'ubuntu-latest',
        env: {},
        continueOnError: false,
        steps: [
          checkout,
          rustToolchain('clippy'),
          rustCache,
          { kind: 'command', name: 'Linting', run: 'cargo clippy -- -D warnings', env: {} },
        ],
      },
      {
        id: 'docs',
        name: 'Docs',
        runsOn: 'ubuntu-22.04',
        env: {},
        continueOnError: false,
        steps: [
          checkout,
          rustToolchain(),
          rustCache,
          {
            kind: 'command',
            name: 'Check documentation',
            run: 'cargo doc --no-deps --document-private-items --all-features',
            env: { RUSTDOCFLAGS: '-D warnings' },
          },
        ],
      },
      {
        id: 'coverage',
        name: 'Code coverage',
        runsOn: 'ubuntu-latest',
        env: {},
        continueOnError: false,
        steps: [
          { ...checkout, name: undefined },
          { ...rustToolchain(), name: undefined },
          { kind: 'command', run: 'cargo install cargo-tarpaulin', env: {} },
          { kind: 'command', run: 'cargo tarpaulin --ignore-tests', env: {} },
        ],
      },
    ],
  },
};
