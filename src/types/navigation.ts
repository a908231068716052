/** An anchor observed on the listing page, before Pass 1 vets it. */
export interface RawLink {
  href: string | null;
  text: string;
}

export type ScrollStopReason = 'stable' | 'upper-bound' | 'max-attempts' | 'error';

export interface ScrollState {
  rounds: number;
  lastHeight: number;
  heightStableRounds: number;
  linkSetStableRounds: number;
  uniqueLinks: number;
}

export interface DiscoveryResult {
  links: RawLink[];
  converged: boolean;
  rounds: number;
  reason: ScrollStopReason;
}
