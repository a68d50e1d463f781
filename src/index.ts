import 'express-async-errors';
import { config as loadEnv } from 'dotenv';
import { resolve } from 'path';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { loadConfig } from './config.js';
import { createRoutes } from './routes/index.js';
import { errorHandler } from './middleware/errorHandler.js';

// .env must be loaded before the config is parsed
loadEnv({ path: resolve(process.cwd(), '.env') });

const config = loadConfig();
const app = express();

// Security middleware
app.use(helmet());
app.use(cors({ origin: config.corsOrigin }));

// Body parsing (location sets can be large)
app.use(express.json({ limit: '10mb' }));

if (config.env !== 'production') {
  console.log('Circle config:', config.circle, config.flatCircle);
}

// Routes
app.use(createRoutes(config));

// Error handling (must be last)
app.use(errorHandler);

app.listen(config.port, '0.0.0.0', () => {
  console.log(`🚀 Circle server running on http://localhost:${config.port}`);
  console.log(`📊 Health check: http://localhost:${config.port}/health`);
  console.log(`🗺️  API: http://localhost:${config.port}/api/circles`);
});
