/**
 * delivered: endpoint answered 200.
 * rejected: endpoint answered with any other status.
 * failed: request could not be built or sent (includes timeout).
 */
export type DispatchOutcome = 'delivered' | 'rejected' | 'failed';
