import { EventEmitter } from 'eventemitter3';

import type { ConnectionCapability, ConnectionEvents, Logger } from '../types';

export interface SimpleConnectionOptions {
  logger?: Logger;
}

/**
 * Holds the driver connection a SimpleConnection drives, and emits its
 * transaction lifecycle events.
 */
export class ConnectionHost extends EventEmitter<ConnectionEvents> {
  readonly logger?: Logger;

  constructor(
    readonly capability: ConnectionCapability,
    options: SimpleConnectionOptions = {},
  ) {
    super();
    if (options.logger) {
      this.logger = options.logger;
    }
  }
}
