import { Inject, Injectable } from '@nestjs/common';
import type { ActionRef } from '../../../declaration/declaration.types';
import { UnknownActionError } from '../../errors';
import { ACTION_HANDLERS, ActionHandler } from './action.types';

/**
 * Closed set of reusable actions, addressed by name + version. Nothing is loaded
 * dynamically: a reference that no registered handler answers to fails the step.
 */
@Injectable()
export class ActionRegistryService {
  constructor(@Inject(ACTION_HANDLERS) private readonly handlers: ActionHandler[]) {}

  find(ref: ActionRef): ActionHandler | null {
    for (const handler of this.handlers) {
      for (const address of handler.addresses) {
        if (address.name !== ref.name) continue;
        if (address.versions === '*' || address.versions.includes(ref.version)) return handler;
      }
    }
    return null;
  }

  /** @throws UnknownActionError */
  resolve(ref: ActionRef): ActionHandler {
    const handler = this.find(ref);
    if (!handler) throw new UnknownActionError(ref);
    return handler;
  }

  /** Every `name@version` pattern the registry answers to, for `relay validate`. */
  listAddresses(): string[] {
    return this.handlers.flatMap((handler) =>
      handler.addresses.map((address) =>
        address.versions === '*'
          ? `${address.name}@*`
          : `${address.name}@${address.versions.join('|')}`,
      ),
    );
  }
}
