import express from 'express';
import dotenv from 'dotenv';
import { defaultRegistry } from './registry.js';
import { Controllers } from './controllers.js'
import { parsePositiveInt, DEFAULT_MAX_EXPRESSION_LENGTH, DEFAULT_PORT } from './utils.js';

// Load environment variables
dotenv.config();

const app = express();
const controllers = new Controllers(defaultRegistry, {
  maxExpressionLength: parsePositiveInt(process.env.MAX_EXPRESSION_LENGTH, DEFAULT_MAX_EXPRESSION_LENGTH),
})

// Middleware, needed for parsing JSON bodies
app.use(express.json());

// Routes
app.post('/evaluate', controllers.evaluateExpression);
app.post('/evaluate/batch', controllers.evaluateBatch);
app.get('/units', controllers.listUnits);
app.get('/healthz', controllers.healthCheck);

// Start server
const PORT = parsePositiveInt(process.env.PORT, DEFAULT_PORT);
app.listen(PORT, () => {
  console.log(`Server is running on http://localhost:${PORT}`);
  console.log(`Unit registry loaded with ${defaultRegistry.entries().length} units`);
});

export { app }; // Export for testing
