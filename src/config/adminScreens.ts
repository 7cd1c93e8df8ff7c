import { CHOICE_LABELS } from '../models/choices';

export interface Fieldset {
  title: string;
  fields: string[];
}

export interface InlineConfig {
  entity: ScreenEntity;
  layout: 'tabular' | 'stacked';
  fields: string[];
  extra: number;
}

export interface AdminScreen {
  title: string;
  titlePlural: string;
  endpoint: string;
  listDisplay: string[];
  listDisplayLinks?: string[];
  listEditable?: string[];
  listFilter: string[];
  searchFields: string[];
  ordering: string[];
  fieldsets?: Fieldset[];
  readonlyFields?: string[];
  inlines?: InlineConfig[];
  choices?: Record<string, Record<string, string>>;
}

export type ScreenEntity = 'companies' | 'contacts' | 'objects' | 'offers' | 'images' | 'agents';

export const adminScreens: Record<ScreenEntity, AdminScreen> = {
  companies: {
    title: 'Company',
    titlePlural: 'Companies',
    endpoint: '/api/admin/companies',
    listDisplay: ['logoPreview', 'name', 'contactsCount', 'objectsCount', 'createdAt'],
    listDisplayLinks: ['name'],
    listFilter: [],
    searchFields: ['name', 'description'],
    ordering: ['name'],
    readonlyFields: ['logoPreview', 'createdAt'],
    inlines: [
      { entity: 'contacts', layout: 'tabular', fields: ['firstName', 'lastName', 'email', 'phone', 'isPrimary'], extra: 1 },
    ],
  },
  contacts: {
    title: 'Contact',
    titlePlural: 'Contacts',
    endpoint: '/api/admin/contacts',
    listDisplay: ['firstName', 'lastName', 'companyName', 'email', 'phone', 'isPrimary'],
    listFilter: ['companyId', 'isPrimary'],
    searchFields: ['firstName', 'lastName', 'email'],
    ordering: ['company', 'isPrimary', 'lastName'],
  },
  objects: {
    title: 'Object',
    titlePlural: 'Objects',
    endpoint: '/api/admin/objects',
    listDisplay: ['name', 'objectType', 'city', 'totalArea', 'status', 'createdAt'],
    listFilter: ['objectType', 'city', 'status'],
    searchFields: ['name', 'address', 'city'],
    ordering: ['-createdAt'],
    fieldsets: [
      { title: 'Basic Information', fields: ['name', 'description', 'objectType', 'status'] },
      { title: 'Location', fields: ['address', 'city', 'latitude', 'longitude'] },
      { title: 'Specifications', fields: ['ownerId', 'totalArea', 'floors', 'buildYear'] },
    ],
    readonlyFields: ['createdAt', 'updatedAt'],
    inlines: [
      { entity: 'images', layout: 'tabular', fields: ['preview', 'image', 'caption', 'order'], extra: 1 },
      { entity: 'offers', layout: 'stacked', fields: ['title', 'vacancyType', 'offerType', 'isAvailable'], extra: 0 },
    ],
    choices: {
      objectType: CHOICE_LABELS.objectType,
      status: CHOICE_LABELS.status,
      city: CHOICE_LABELS.city,
    },
  },
  offers: {
    title: 'Offer',
    titlePlural: 'Offers',
    endpoint: '/api/admin/offers',
    listDisplay: ['title', 'objectName', 'vacancyType', 'offerType', 'priceDisplay', 'isAvailable', 'createdAt'],
    listFilter: ['vacancyType', 'offerType', 'isAvailable'],
    searchFields: ['title', 'objectName'],
    ordering: ['-createdAt'],
    fieldsets: [
      { title: 'Listing', fields: ['objectId', 'parentOfferId', 'title', 'vacancyType', 'offerType', 'contactPersonId', 'description'] },
      { title: 'Areas', fields: ['whsArea', 'mezArea', 'officeArea', 'techArea', 'totalArea'] },
      { title: 'Pricing', fields: ['salePrice', 'leasePricePerSqm', 'currency', 'priceDisplay'] },
      { title: 'Availability', fields: ['isAvailable', 'availableFrom'] },
      { title: 'Technical specifications', fields: ['height', 'columnGrid', 'floorLoad', 'floorType', 'docksAmount'] },
      { title: 'Fire safety', fields: ['fireAlarm', 'sprinklerSystem', 'smokeRemove', 'hydrants', 'specialFireSystem'] },
      { title: 'Utilities', fields: ['ventilation', 'electricity', 'water', 'heating', 'sew'] },
      { title: 'Media', fields: ['floorplanImage'] },
    ],
    readonlyFields: ['totalArea', 'priceDisplay', 'createdAt', 'updatedAt'],
    choices: {
      vacancyType: CHOICE_LABELS.vacancyType,
      offerType: CHOICE_LABELS.offerType,
      floorType: CHOICE_LABELS.floorType,
      water: CHOICE_LABELS.utility,
      heating: CHOICE_LABELS.utility,
      sew: CHOICE_LABELS.utility,
    },
  },
  images: {
    title: 'Photo',
    titlePlural: 'Photos',
    endpoint: '/api/admin/images',
    listDisplay: ['preview', 'objectName', 'caption', 'order'],
    listEditable: ['caption', 'order'],
    listFilter: ['objectId'],
    searchFields: [],
    ordering: ['order', 'uploadedAt'],
    readonlyFields: ['preview', 'uploadedAt'],
  },
  agents: {
    title: 'Agent',
    titlePlural: 'Agents',
    endpoint: '/api/admin/agents',
    listDisplay: ['displayName', 'companyName', 'isActive'],
    listFilter: ['companyId', 'isActive'],
    searchFields: ['username', 'firstName', 'lastName', 'email'],
    ordering: ['username'],
  },
};

export const isScreenEntity = (value: string): value is ScreenEntity => Object.hasOwn(adminScreens, value);
