import type { InboundMessage } from '@wa-relay/whatsapp-sdk';

import type { DeploymentType } from '../../config';

/** Returns true when this deployment must leave the message alone. */
export type MessageFilter = (message: InboundMessage) => boolean;

/**
 * Staging shares its test number with developers running the relay locally;
 * messages starting with `prefix` are theirs.
 */
export function devPrefixFilter(prefix: string): MessageFilter {
  return (message) => typeof message.text === 'string' && message.text.startsWith(prefix);
}

export function createMessageFilters(deploymentType: DeploymentType, devFilterPrefix: string): MessageFilter[] {
  return deploymentType === 'staging' ? [devPrefixFilter(devFilterPrefix)] : [];
}
