/**
 * Buyer identity and tier resolution.
 * Maps a buyer context to its effective access tier and a stable pricing key.
 * Unauthenticated buyers always resolve to the public tier, whatever they claim.
 */

import type {
  AccessTier,
  BuyerContext,
  BuyerIdentity,
  BuyerRelationship,
  IdentityLevel,
} from '../types/models.js';
import type { BuyerSummary } from '../types/api.js';

export const PUBLIC_PRICING_KEY = 'public';

export function anonymousBuyer(claimedIdentity?: BuyerIdentity): BuyerContext {
  return claimedIdentity ? { kind: 'anonymous', claimedIdentity } : { kind: 'anonymous' };
}

export function authenticatedBuyer(
  identity: BuyerIdentity,
  relationship?: BuyerRelationship
): BuyerContext {
  return relationship
    ? { kind: 'authenticated', identity, relationship }
    : { kind: 'authenticated', identity };
}

export function identityLevel(identity: BuyerIdentity): IdentityLevel {
  if (identity.advertiserId && identity.agencyId) return 'agency_and_advertiser';
  if (identity.agencyId) return 'agency_only';
  if (identity.seatId) return 'seat_only';
  return 'anonymous';
}

export function accessTier(identity: BuyerIdentity): AccessTier {
  switch (identityLevel(identity)) {
    case 'agency_and_advertiser':
      return 'advertiser';
    case 'agency_only':
      return 'agency';
    case 'seat_only':
      return 'seat';
    case 'anonymous':
      return 'public';
  }
}

export function isAuthenticated(buyer: BuyerContext): boolean {
  return buyer.kind === 'authenticated';
}

export function effectiveTier(buyer: BuyerContext): AccessTier {
  switch (buyer.kind) {
    case 'anonymous':
      return 'public';
    case 'authenticated':
      return accessTier(buyer.identity);
  }
}

/** Identity as presented, verified or not. */
export function presentedIdentity(buyer: BuyerContext): BuyerIdentity {
  switch (buyer.kind) {
    case 'anonymous':
      return buyer.claimedIdentity ?? {};
    case 'authenticated':
      return buyer.identity;
  }
}

/**
 * Identity that may scope pricing rules. Anonymous claims are dropped so an
 * unverified agency or advertiser id cannot unlock a rule.
 */
export function verifiedIdentity(buyer: BuyerContext): BuyerIdentity {
  switch (buyer.kind) {
    case 'anonymous':
      return {};
    case 'authenticated':
      return buyer.identity;
  }
}

export function relationshipOf(buyer: BuyerContext): BuyerRelationship | undefined {
  return buyer.kind === 'authenticated' ? buyer.relationship : undefined;
}

/**
 * Most specific identifier present: advertiser, then agency, then seat.
 * The same advertiser bought through different agencies shares a key,
 * which keeps their pricing consistent.
 */
export function pricingKey(buyer: BuyerContext): string {
  const identity = presentedIdentity(buyer);
  if (identity.advertiserId) return `advertiser:${identity.advertiserId}`;
  if (identity.agencyId) return `agency:${identity.agencyId}`;
  if (identity.seatId) return `seat:${identity.seatId}`;
  return PUBLIC_PRICING_KEY;
}

export function eligibleForNegotiation(buyer: BuyerContext): boolean {
  const tier = effectiveTier(buyer);
  return tier === 'agency' || tier === 'advertiser';
}

export function eligibleForPremiumInventory(buyer: BuyerContext): boolean {
  return isAuthenticated(buyer) && effectiveTier(buyer) !== 'public';
}

export function summarizeBuyer(buyer: BuyerContext): BuyerSummary {
  return {
    tier: effectiveTier(buyer),
    pricingKey: pricingKey(buyer),
    authenticated: isAuthenticated(buyer),
  };
}
