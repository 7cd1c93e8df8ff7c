import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { config } from './config/env';
import { allowedHosts, requireHttps } from './middleware/hosts';
import authRoutes from './routes/auth';
import adminRoutes from './routes/adminRoutes';

const app = express();

// Behind a reverse proxy in production; req.secure follows X-Forwarded-Proto
app.set('trust proxy', 1);

// Middleware
app.use(requireHttps(config));
app.use(allowedHosts(config));
app.use(helmet({ crossOriginResourcePolicy: { policy: 'cross-origin' } }));
app.use(cors({
  origin: config.allowedOrigins.length > 0 ? config.allowedOrigins : '*',
  methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization'],
}));
if (process.env.NODE_ENV !== 'test') {
  app.use(morgan('combined'));
}
// Base64 uploads are about a third larger than the 10MB file limit
app.use(express.json({ limit: '15mb' }));
app.use(express.urlencoded({ extended: true }));

// Health check route
app.get('/health', (req, res) => {
  res.status(200).json({
    status: 'OK',
    message: 'Brokerage back-office API is running',
    timestamp: new Date().toISOString(),
  });
});

app.get('/api', (req, res) => {
  res.json({
    message: 'Brokerage back-office API',
    version: '1.0.0',
  });
});

// Uploaded files are served from disk only when they are stored locally
if (config.storage.backend === 'local') {
  app.use(config.media.url.replace(/\/$/, ''), express.static(config.media.root));
}

app.use('/api/auth', authRoutes);
app.use('/api/admin', adminRoutes);

app.use((req, res) => {
  res.status(404).json({ message: 'Not found' });
});

export default app;
