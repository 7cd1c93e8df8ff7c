import { Request, Response, NextFunction } from 'express';
import type { AppConfig } from '../config/env';

const DEBUG_HOSTS = ['localhost', '127.0.0.1', '[::1]'];

const stripPort = (host: string) => {
  if (host.startsWith('[')) {
    const end = host.indexOf(']');
    return end === -1 ? host : host.slice(0, end + 1);
  }
  return host.split(':')[0];
};

export const isHostAllowed = (host: string | undefined, allowedHosts: string[], debug: boolean) => {
  if (!host) return false;
  const hostname = stripPort(host.trim().toLowerCase());
  const patterns = allowedHosts.length === 0 && debug ? DEBUG_HOSTS : allowedHosts;

  return patterns.some(pattern => {
    const normalized = pattern.toLowerCase();
    if (normalized === '*') return true;
    // '.example.com' matches the domain and all its subdomains
    if (normalized.startsWith('.')) {
      return hostname === normalized.slice(1) || hostname.endsWith(normalized);
    }
    return hostname === normalized;
  });
};

export const allowedHosts = (appConfig: AppConfig) => (req: Request, res: Response, next: NextFunction) => {
  if (req.path === '/health' || isHostAllowed(req.headers.host, appConfig.allowedHosts, appConfig.debug)) {
    return next();
  }
  console.log(`❌ Rejected request for host ${req.headers.host}`);
  res.status(400).json({ message: 'Invalid host header' });
};

export const requireHttps = (appConfig: AppConfig) => (req: Request, res: Response, next: NextFunction) => {
  if (appConfig.env !== 'production' || req.secure || req.path === '/health') {
    return next();
  }
  res.redirect(301, `https://${req.headers.host}${req.originalUrl}`);
};
