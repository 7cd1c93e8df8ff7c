import { Router } from 'express';
import { authenticateToken, ensureStaff } from '../middleware/auth';
import { getScreens, getScreen } from '../controllers/screenController';
import { getAdminLog } from '../controllers/adminLogController';
import { getUsers, createUser, updateUser, deleteUser } from '../controllers/userController';
import {
  getCompanies,
  getCompanyById,
  createCompany,
  updateCompany,
  deleteCompany,
  uploadCompanyLogo,
  removeCompanyLogo,
} from '../controllers/companyController';
import {
  getContacts,
  getContactById,
  createContact,
  updateContact,
  deleteContact,
} from '../controllers/contactController';
import {
  getAgents,
  getAgentById,
  createAgent,
  updateAgent,
  deleteAgent,
} from '../controllers/agentController';
import {
  getObjects,
  getObjectById,
  createObject,
  updateObject,
  deleteObject,
} from '../controllers/objectController';
import {
  getOffers,
  getOfferById,
  createOffer,
  updateOffer,
  deleteOffer,
  uploadOfferFloorplan,
} from '../controllers/offerController';
import {
  getImages,
  uploadObjectImage,
  updateImage,
  bulkUpdateImages,
  deleteImage,
} from '../controllers/objectImageController';

const router = Router();

// All admin routes require an authenticated staff user
router.use(authenticateToken);
router.use(ensureStaff);

// Screen configuration and history
router.get('/screens', getScreens);
router.get('/screens/:entity', getScreen);
router.get('/log', getAdminLog);

// User accounts
router.get('/users', getUsers);
router.post('/users', createUser);
router.put('/users/:id', updateUser);
router.delete('/users/:id', deleteUser);

// Companies
router.get('/companies', getCompanies);
router.get('/companies/:id', getCompanyById);
router.post('/companies', createCompany);
router.put('/companies/:id', updateCompany);
router.delete('/companies/:id', deleteCompany);
router.post('/companies/:id/logo', uploadCompanyLogo);
router.delete('/companies/:id/logo', removeCompanyLogo);

// Contacts
router.get('/contacts', getContacts);
router.get('/contacts/:id', getContactById);
router.post('/contacts', createContact);
router.put('/contacts/:id', updateContact);
router.delete('/contacts/:id', deleteContact);

// Agents
router.get('/agents', getAgents);
router.get('/agents/:id', getAgentById);
router.post('/agents', createAgent);
router.put('/agents/:id', updateAgent);
router.delete('/agents/:id', deleteAgent);

// Objects
router.get('/objects', getObjects);
router.get('/objects/:id', getObjectById);
router.post('/objects', createObject);
router.put('/objects/:id', updateObject);
router.delete('/objects/:id', deleteObject);
router.post('/objects/:id/images', uploadObjectImage);

// Offers
router.get('/offers', getOffers);
router.get('/offers/:id', getOfferById);
router.post('/offers', createOffer);
router.put('/offers/:id', updateOffer);
router.delete('/offers/:id', deleteOffer);
router.post('/offers/:id/floorplan', uploadOfferFloorplan);

// Object images
router.get('/images', getImages);
router.patch('/images', bulkUpdateImages);
router.put('/images/:id', updateImage);
router.delete('/images/:id', deleteImage);

export default router;
