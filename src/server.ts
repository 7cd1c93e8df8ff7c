import app from './app';
import { config } from './config/env';

app.listen(config.port, config.host, () => {
  console.log('\n' + '='.repeat(60));
  console.log('🚀 BROKERAGE BACK-OFFICE API SERVER');
  console.log('='.repeat(60));
  console.log(`📍 Local:    http://localhost:${config.port}/health`);
  console.log(`🔗 API:      http://localhost:${config.port}/api`);
  console.log(`🔐 Admin:    http://localhost:${config.port}/api/admin`);
  console.log(`🗂️  Storage:  ${config.storage.backend}`);
  console.log(`🛠️  Mode:     ${config.env}${config.debug ? ' (debug)' : ''}`);
  console.log('='.repeat(60));
  console.log('✅ Server is ready to accept requests\n');
});
