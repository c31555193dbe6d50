/**
 * Canonical text renderings fed to embedding models.
 * Keys are sorted so equal targeting always produces equal text.
 */

import type { AudienceRequirements, ProductDefinition } from '../types/models.js';

export function describeTargeting(targeting: AudienceRequirements): string {
  const lines = Object.keys(targeting)
    .sort()
    .map((key) => `${key}: ${renderValue(targeting[key])}`);
  return `Audience targeting\n${lines.join('\n')}`;
}

export function describeProduct(product: ProductDefinition): string {
  return [
    `Inventory product ${product.productId}: ${product.name}`,
    `inventory_type: ${product.inventoryType}`,
    `deal_types: ${product.supportedDealTypes.join(', ')}`,
    `capabilities: ${(product.audienceCapabilityIds ?? []).join(', ')}`,
  ].join('\n');
}

function renderValue(value: unknown): string {
  if (Array.isArray(value)) return value.map(renderValue).join(', ');
  if (value && typeof value === 'object') {
    return Object.entries(value)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]: [string, unknown]) => `${k}=${renderValue(v)}`)
      .join('; ');
  }
  return String(value);
}
