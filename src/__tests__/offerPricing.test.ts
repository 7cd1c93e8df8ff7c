import { computeTotalArea, formatPriceDisplay, PRICE_NOT_SET } from '../utils/offerPricing';

describe('computeTotalArea', () => {
  it('sums the four area zones', () => {
    expect(computeTotalArea({ whsArea: '1000.50', mezArea: '200.25', officeArea: '150.00', techArea: '0.00' })).toBe(1350.75);
  });

  it('rounds to two decimals', () => {
    expect(computeTotalArea({ whsArea: '0.10', mezArea: '0.20', officeArea: '0', techArea: '0' })).toBe(0.3);
  });

  it('is zero when every zone is zero', () => {
    expect(computeTotalArea({ whsArea: '0', mezArea: '0', officeArea: '0', techArea: '0' })).toBe(0);
  });
});

describe('formatPriceDisplay', () => {
  const base = { salePrice: null, leasePricePerSqm: null, currency: 'RUB' };

  it('shows the sale price for sale offers', () => {
    expect(formatPriceDisplay({ ...base, offerType: 'sale', salePrice: '500000.00' })).toBe('500,000 RUB');
  });

  it('shows the rate per square metre for lease offers', () => {
    expect(formatPriceDisplay({ ...base, offerType: 'lease', leasePricePerSqm: '120.00' })).toBe('120 RUB/m²');
  });

  it('joins both prices for offers available either way', () => {
    expect(formatPriceDisplay({
      ...base,
      offerType: 'both',
      salePrice: '15000000',
      leasePricePerSqm: '850.50',
    })).toBe('15,000,000 RUB | 850.5 RUB/m²');
  });

  it('leaves out the missing half of a both offer', () => {
    expect(formatPriceDisplay({ ...base, offerType: 'both', leasePricePerSqm: '850.50' })).toBe('850.5 RUB/m²');
  });

  it('falls back to the placeholder when the relevant price is missing', () => {
    expect(formatPriceDisplay({ ...base, offerType: 'sale' })).toBe(PRICE_NOT_SET);
    expect(formatPriceDisplay({ ...base, offerType: 'lease', salePrice: '100' })).toBe('price not set');
    expect(formatPriceDisplay({ ...base, offerType: 'both' })).toBe('price not set');
  });

  it('uses the offer currency', () => {
    expect(formatPriceDisplay({ ...base, offerType: 'sale', salePrice: '2500.75', currency: 'EUR' })).toBe('2,500.75 EUR');
  });
});
