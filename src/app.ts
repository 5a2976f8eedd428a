// Load environment variables first
import '@/config/app.config';

import express, { Express } from 'express';
import cookieParser from 'cookie-parser';
import mainRouter from '@/routes/index';
import { errorHandler, notFoundHandler } from '@/middlewares/errorHandler';
import { loadSession } from '@/middlewares/session.middleware';
import swaggerUi from 'swagger-ui-express';
import { swaggerSpec } from './config/swagger';

const app: Express = express();

// Middlewares
app.use(express.urlencoded({ extended: false })); // HTML form posts
app.use(express.json());
app.use(cookieParser());
app.use(loadSession); // attaches req.identity from the session cookie

// Swagger UI route
app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec, {
  customCss: '.swagger-ui .topbar { display: none }',
  customSiteTitle: "School Portal Routes"
}));

// Routes
app.use('/', mainRouter);

// Not found handler (should be after all routes)
app.use(notFoundHandler);

// Global error handler (should be the last middleware)
app.use(errorHandler);

export { app };
