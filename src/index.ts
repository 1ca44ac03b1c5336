import app from './app';
import { config } from './config/env';
import { initializeDatabase } from './services/setupService';

const start = async () => {
  const { adminCreated } = await initializeDatabase();
  if (adminCreated) {
    console.log('Default admin account created (username: admin, password from ADMIN_INITIAL_PASSWORD).');
  }
  app.listen(config.port, () => {
    console.log(`Student records server running on port ${config.port}`);
  });
};

start().catch((error: unknown) => {
  console.error('Failed to start server', error);
  process.exitCode = 1;
});
