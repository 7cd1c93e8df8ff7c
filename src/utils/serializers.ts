import type { User } from '../models/user';
import type { Company, Contact } from '../models/company';
import type { RealEstateObject, ObjectImage } from '../models/object';
import type { Offer } from '../models/offer';
import { CHOICE_LABELS } from '../models/choices';
import { fileUrl } from '../services/storageService';
import { computeTotalArea, formatPriceDisplay } from './offerPricing';
import { renderImagePreview, renderLogoPreview } from './imagePreview';

export const userDisplayName = (user: Pick<User, 'firstName' | 'lastName' | 'username'>) =>
  `${user.firstName} ${user.lastName}`.trim() || user.username;

export const serializeUser = (user: User) => ({
  id: user.id,
  username: user.username,
  firstName: user.firstName,
  lastName: user.lastName,
  email: user.email,
  isStaff: user.isStaff,
  isActive: user.isActive,
  displayName: userDisplayName(user),
  createdAt: user.createdAt,
  lastLogin: user.lastLogin,
});

export const serializeCompany = (company: Company) => {
  const logoUrl = fileUrl(company.logo);
  return {
    ...company,
    logoUrl,
    logoPreview: renderLogoPreview(logoUrl),
  };
};

export const contactDisplayName = (contact: Pick<Contact, 'firstName' | 'lastName'>) =>
  `${contact.firstName} ${contact.lastName}`;

export const serializeContact = (contact: Contact) => ({
  ...contact,
  displayName: contactDisplayName(contact),
});

export const objectDisplayName = (object: Pick<RealEstateObject, 'objectType' | 'name'>) =>
  `${CHOICE_LABELS.objectType[object.objectType]} - ${object.name}`;

export const serializeObject = (object: RealEstateObject) => ({
  ...object,
  displayName: objectDisplayName(object),
});

export const serializeOffer = (offer: Offer, objectName?: string) => ({
  ...offer,
  totalArea: computeTotalArea(offer),
  priceDisplay: formatPriceDisplay(offer),
  floorplanUrl: fileUrl(offer.floorplanImage),
  ...(objectName === undefined ? {} : { displayName: `${offer.title} - ${objectName}` }),
});

export const serializeImage = (image: ObjectImage) => {
  const url = fileUrl(image.image);
  return {
    ...image,
    url,
    preview: renderImagePreview(url),
  };
};
