export const OBJECT_TYPES = ['warehouse', 'other'] as const;
export const OBJECT_STATUSES = ['active', 'inactive', 'draft'] as const;
export const CITIES = ['msk', 'spb'] as const;

export const VACANCY_TYPES = ['entire_object', 'unit'] as const;
export const OFFER_TYPES = ['sale', 'lease', 'both'] as const;
export const FLOOR_TYPES = ['concrete', 'tile', 'asphalt', 'dustfree'] as const;
export const UTILITY_TYPES = ['municipal', 'private', 'none'] as const;

export type ObjectType = (typeof OBJECT_TYPES)[number];
export type ObjectStatus = (typeof OBJECT_STATUSES)[number];
export type City = (typeof CITIES)[number];
export type VacancyType = (typeof VACANCY_TYPES)[number];
export type OfferType = (typeof OFFER_TYPES)[number];
export type FloorType = (typeof FLOOR_TYPES)[number];
export type UtilityType = (typeof UTILITY_TYPES)[number];

export const CHOICE_LABELS = {
  objectType: { warehouse: '🏭 Warehouse', other: '🔀 Other' },
  status: { active: '✅ Active', inactive: '❌ On hold', draft: '📝 Draft' },
  city: { msk: 'Moscow', spb: 'Saint Petersburg' },
  vacancyType: { entire_object: '🏢 Entire object', unit: '📦 Unit' },
  offerType: { sale: '💰 Sale', lease: '📄 Lease', both: '💼 Lease or sale' },
  floorType: { concrete: 'Concrete', tile: 'Tile', asphalt: 'Asphalt', dustfree: 'Dust-free concrete' },
  utility: { municipal: 'Municipal', private: 'Private', none: 'None' },
} satisfies {
  objectType: Record<ObjectType, string>;
  status: Record<ObjectStatus, string>;
  city: Record<City, string>;
  vacancyType: Record<VacancyType, string>;
  offerType: Record<OfferType, string>;
  floorType: Record<FloorType, string>;
  utility: Record<UtilityType, string>;
};
