import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import cookieParser from 'cookie-parser';
import morgan from 'morgan';

import { env } from './config/env.js';
import { apiLimiter } from './middleware/rateLimiter.js';
import { csrfProtection, generateCsrfToken } from './middleware/csrf.js';
import { errorHandler } from './middleware/errorHandler.js';
import { httpLogStream } from './utils/logger.js';

// Route imports
import authRoutes from './modules/auth/auth.routes.js';
import userRoutes from './modules/users/users.routes.js';
import customerRoutes from './modules/customers/customers.routes.js';
import garmentRoutes from './modules/garments/garments.routes.js';
import inventoryRoutes from './modules/inventory/inventory.routes.js';
import orderRoutes from './modules/orders/orders.routes.js';
import taskRoutes from './modules/tasks/tasks.routes.js';
import paymentRoutes from './modules/payments/payments.routes.js';
import claimRoutes from './modules/claims/claims.routes.js';
import commissionRoutes from './modules/commissions/commissions.routes.js';
import notificationRoutes from './modules/notifications/notification.routes.js';
import reportRoutes from './modules/reports/reports.routes.js';

const app = express();
app.set('trust proxy', 1);

// ── Security Headers ──
// Receipts are printable HTML with inline styles and a print button
app.use(
  helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'"],
        scriptSrcAttr: ["'unsafe-inline'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        imgSrc: ["'self'", 'data:'],
        connectSrc: ["'self'", env.CORS_ORIGIN],
        objectSrc: ["'none'"],
        frameAncestors: ["'none'"],
        baseUri: ["'self'"],
        formAction: ["'self'"],
      },
    },
    hsts: {
      maxAge: 31536000,
      includeSubDomains: true,
    },
  }),
);

// ── CORS ──
app.use(
  cors({
    origin: env.CORS_ORIGIN.split(',').map((o) => o.trim()),
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-CSRF-Token', 'Idempotency-Key'],
  }),
);

// ── Body Parsing ──
app.use(express.json({ limit: '1mb' }));
app.use(express.urlencoded({ extended: true, limit: '1mb' }));
app.use(cookieParser());

// ── HTTP Logging ──
app.use(morgan(env.NODE_ENV === 'production' ? 'combined' : 'dev', { stream: httpLogStream }));

// ── Global Rate Limiter ──
app.use(apiLimiter);

// ── CSRF Token Endpoint (before csrf protection) ──
app.get(`${env.API_PREFIX}/csrf-token`, (_req, res) => {
  const token = generateCsrfToken();
  res.cookie('csrfToken', token, {
    httpOnly: false,
    secure: env.COOKIE_SECURE,
    sameSite: env.COOKIE_SAMESITE,
    domain: env.COOKIE_DOMAIN,
    path: '/',
  });
  res.json({ success: true, data: { csrfToken: token } });
});

// ── CSRF Protection (state-changing methods) ──
app.use(csrfProtection);

// ── Health Check ──
app.get(`${env.API_PREFIX}/health`, (_req, res) => {
  res.json({
    success: true,
    data: {
      status: 'ok',
      shop: env.SHOP_NAME,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    },
  });
});

// ── API Routes ──
const prefix = env.API_PREFIX;

app.use(`${prefix}/auth`, authRoutes);
app.use(`${prefix}/users`, userRoutes);
app.use(`${prefix}/customers`, customerRoutes);
app.use(`${prefix}/garments`, garmentRoutes);
app.use(`${prefix}/inventory`, inventoryRoutes);
app.use(`${prefix}/orders`, orderRoutes);
app.use(`${prefix}/tasks`, taskRoutes);
app.use(`${prefix}/payments`, paymentRoutes);
app.use(`${prefix}/claims`, claimRoutes);
app.use(`${prefix}/commissions`, commissionRoutes);
app.use(`${prefix}/notifications`, notificationRoutes);
app.use(`${prefix}/reports`, reportRoutes);

// ── 404 Handler ──
app.use((_req, res) => {
  res.status(404).json({
    success: false,
    error: { code: 'NOT_FOUND', message: 'Route not found' },
  });
});

// ── Global Error Handler ──
app.use(errorHandler);

export default app;
