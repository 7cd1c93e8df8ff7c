import os from 'os';
import path from 'path';

process.env.SECRET_KEY = 'test-secret';
process.env.APP_ENV = 'development';
process.env.ALLOWED_HOSTS = '';
process.env.ALLOWED_ORIGINS = '';
process.env.MEDIA_URL = '/media/';
process.env.MEDIA_ROOT = path.join(os.tmpdir(), `brokerage-media-${process.pid}`);
