import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import { engineConfig } from '../../../config/engine.config';
import { ActionContext, ActionHandler, ActionOutcome, failed, paramList, succeeded } from './action.types';

const RUST_TOOLCHAIN = 'dtolnay/rust-toolchain';

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Puts a toolchain on the job's PATH. Installation itself is out of our hands: tools are
 * expected under <toolchainRoot>/<tool>/<version>/bin; when that directory does not
 * exist the job keeps using whatever the host PATH provides.
 *
 * dtolnay/rust-toolchain@<channel> selects the rust channel through its version;
 * actions/setup-toolchain@v1 takes `tool` and `version` parameters.
 */
@Injectable()
export class ToolchainAction implements ActionHandler {
  readonly addresses = [
    { name: RUST_TOOLCHAIN, versions: '*' },
    { name: 'actions/setup-toolchain', versions: ['v1'] },
  ] as const;

  constructor(
    @Inject(engineConfig.KEY) private readonly config: ConfigType<typeof engineConfig>,
  ) {}

  async run({ step, env, log }: ActionContext): Promise<ActionOutcome> {
    const isRust = step.uses.name === RUST_TOOLCHAIN;
    const tool = isRust ? 'rust' : String(step.with.tool ?? '');
    const version = String(step.with.toolchain ?? step.with.version ?? (isRust ? step.uses.version : ''));
    if (!tool) return failed('setup-toolchain: the "tool" parameter is required');
    if (!version) return failed(`setup-toolchain: no version given for ${tool}`);

    const components = paramList(step.with.components);
    env.toolchains.set(tool, { name: tool, version, components });

    const bin = join(this.config.toolchainRoot, tool, version, 'bin');
    if (await isDirectory(bin)) {
      env.prependPath(bin);
      log('system', `Using ${tool} ${version} from ${bin}`);
    } else {
      log('system', `No managed ${tool} ${version}; using the host toolchain`);
    }

    if (isRust) {
      env.exportVar('RUSTUP_TOOLCHAIN', version);
      if (components.length) env.exportVar('RELAY_RUST_COMPONENTS', components.join(','));
    }
    return succeeded(`${tool} ${version}${components.length ? ` (${components.join(', ')})` : ''}\n`);
  }
}
