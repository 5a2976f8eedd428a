import 'module-alias/register'; // resolves '@/...' imports in the compiled output
import { app } from './app'; // Imports from app.ts
import { config } from './config/app.config';
import { dataStore } from './lib/jsonStore';
import { userRepository } from './lib/user.repository';

const start = async () => {
  await dataStore.ensureCollections();
  await userRepository.seedDefaultUsers();

  const server = app.listen(config.port, () => {
    console.log(`🚀 Server is running on http://localhost:${config.port}`);
    console.log(`Data directory: ${config.dataDir}`);
  });

  // Graceful shutdown
  const signals = ['SIGINT', 'SIGTERM'];
  signals.forEach(signal => {
    process.on(signal, () => {
      console.log(`\nReceived ${signal}, shutting down gracefully...`);
      server.close(() => {
        console.log('Server closed.');
        process.exit(0);
      });
    });
  });
};

start().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
