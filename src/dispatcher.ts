/**
 * Dispatcher: pure routing decision, no I/O.
 *
 * @packageDocumentation
 */

import type { ModelRegistry } from './registry.js';
import type { DispatchResult, InboundRequest, Principal } from './types.js';

export class Dispatcher {
  constructor(private readonly registry: ModelRegistry) {}

  /**
   * @throws UnknownModel when the requested model has no backend
   */
  dispatch(request: InboundRequest, _principal: Principal): DispatchResult {
    const backend = this.registry.resolve(request.body.model);
    return { backend, mode: request.body.stream ? 'streaming' : 'buffered' };
  }
}
