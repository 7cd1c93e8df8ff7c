import type { Offer } from '../models/offer';

type AreaFields = Pick<Offer, 'whsArea' | 'mezArea' | 'officeArea' | 'techArea'>;
type PriceFields = Pick<Offer, 'offerType' | 'salePrice' | 'leasePricePerSqm' | 'currency'>;

export const PRICE_NOT_SET = 'price not set';

const numberFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 2 });

const toNumber = (value: string | number | null | undefined): number | null => {
  if (value === null || value === undefined || value === '') return null;
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
};

/**
 * Total leasable area of an offer. Always recomputed from the four zones and
 * never persisted.
 */
export const computeTotalArea = (offer: AreaFields): number => {
  const sum = [offer.whsArea, offer.mezArea, offer.officeArea, offer.techArea]
    .reduce<number>((acc, area) => acc + (toNumber(area) ?? 0), 0);
  return Math.round(sum * 100) / 100;
};

/**
 * Price line shown in admin lists, picked by offer type. Parts with no value
 * are left out; when nothing is left the placeholder is returned.
 */
export const formatPriceDisplay = (offer: PriceFields): string => {
  const salePrice = toNumber(offer.salePrice);
  const leaseRate = toNumber(offer.leasePricePerSqm);

  const salePart = salePrice === null ? null : `${numberFormat.format(salePrice)} ${offer.currency}`;
  const leasePart = leaseRate === null ? null : `${numberFormat.format(leaseRate)} ${offer.currency}/m²`;

  switch (offer.offerType) {
    case 'sale':
      return salePart ?? PRICE_NOT_SET;
    case 'lease':
      return leasePart ?? PRICE_NOT_SET;
    case 'both': {
      const parts = [salePart, leasePart].filter((part): part is string => part !== null);
      return parts.length > 0 ? parts.join(' | ') : PRICE_NOT_SET;
    }
  }
};
