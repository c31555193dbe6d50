/**
 * Database row types, mirroring actual Supabase table schemas.
 * Kept separate so the database can evolve independently of domain models.
 * Column names use snake_case to match PostgreSQL conventions.
 */

import type { FlatRecord } from '../utils/flatten.js';

// ── Catalog ──

export interface ProductRow {
  product_id: string;
  name: string;
  inventory_type: string;
  base_cpm: number;
  floor_cpm: number;
  currency: string;
  supported_deal_types: string[];
  supported_pricing_models: string[];
  minimum_impressions: number;
  maximum_impressions: number | null;
  audience_capability_ids: string[] | null;
}

export interface AudienceCapabilityRow {
  capability_id: string;
  product_id: string;
  name: string;
  signal_type: string;
  coverage_percentage: number;
  available_segments: string[];
  ucp_compatible: boolean;
  embedding_dimension: number | null;
}

// ── Pricing ──

export interface PricingRuleRow {
  rule_id: string;
  rule_name: string;
  priority: number;
  access_tier: string | null;
  agency_ids: string[];
  advertiser_ids: string[];
  holding_company_ids: string[];
  product_ids: string[];
  inventory_types: string[];
  base_price_override: number | null;
  discount_percentage: number;
  /** jsonb array of { min_impressions, max_impressions, discount_type, discount_value }. */
  volume_discounts: unknown;
  negotiation_enabled: boolean;
  max_negotiation_discount: number;
  valid_from: string | null;
  valid_to: string | null;
  is_active: boolean;
}

// ── Evaluation audit (append-only) ──

export interface ProposalEvaluationRow {
  id: string;
  proposal_id: string;
  status: string;
  recommendation: string | null;
  decision_source: string | null;
  /** Flattened EvaluationResult. */
  payload: FlatRecord;
  created_at: string;
}

export interface PricingDecisionRow {
  id: string;
  proposal_id: string;
  product_id: string;
  pricing_key: string;
  buyer_tier: string;
  final_price: number;
  currency: string;
  /** Flattened PricingDecision. */
  payload: FlatRecord;
  created_at: string;
}

// ── Deals ──

export interface DealRow {
  deal_id: string;
  deal_type: string;
  proposal_id: string;
  product_id: string;
  price: number;
  pricing_model: string;
  currency: string;
  guaranteed_impressions: number | null;
  floor_price: number | null;
  buyer_organization_id: string;
  seller_organization_id: string;
  flight_start: string;
  flight_end: string;
  activation_type: string;
  dsp_compatible: boolean;
  created_at: string;
}
