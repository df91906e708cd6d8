/**
 * Wires the authentication, delivery and listing components from one configuration.
 */

import { Authenticator } from './auth/index.js';
import type { GatewayConfig } from './config/index.js';
import { DirectoryEntryFilter } from './listing/index.js';
import { getLogger } from './logging/index.js';
import { CompressionNegotiator, StreamingSender, type CompressionNegotiatorOptions } from './response/index.js';

const logger = getLogger('gateway');

export class DavGateway {
  readonly authenticator: Authenticator;
  readonly negotiator: CompressionNegotiator;
  readonly sender: StreamingSender;
  readonly entryFilter: DirectoryEntryFilter;

  constructor(
    readonly config: GatewayConfig,
    negotiatorOptions: CompressionNegotiatorOptions = {}
  ) {
    this.authenticator = Authenticator.fromConfig(config);
    this.negotiator = new CompressionNegotiator(config.compression, negotiatorOptions);
    this.sender = new StreamingSender({ negotiator: this.negotiator, level: config.compression.level });
    this.entryFilter = new DirectoryEntryFilter(config.hideFileInDir);

    logger.info(
      `Gateway ready: ${config.accounts.length} account(s), digest ${config.httpDigestAuth.enable ? 'enabled' : 'disabled'}, compression level ${config.compression.level}`
    );
  }
}
