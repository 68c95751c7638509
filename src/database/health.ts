import { loadConfig } from '../config/env.js';
import { Database } from '../config/database.js';

async function performHealthCheck() {
  const config = loadConfig();
  const db = new Database(config.database);

  try {
    const health = await db.healthCheck();
    console.log('📊 Database Health Check Results:');
    console.log('Status:', health.status);
    console.log('Details:', JSON.stringify(health.details, null, 2));

    const stats = await db.getStatistics(30);
    console.log('\n📈 Booking Statistics (Last 30 days):');
    console.log('Total Appointments:', stats.totalAppointments);
    console.log('Confirmed:', stats.confirmedAppointments);
    console.log('Pending Holds:', stats.pendingAppointments);
    console.log('Cancelled:', stats.cancelledAppointments);
    console.log('Unique Clients:', stats.uniqueClients);
    console.log('Cancellation Rate:', (stats.cancellationRate * 100).toFixed(2) + '%');

    if (health.status === 'unhealthy') {
      process.exitCode = 1;
    }
  } finally {
    db.close();
  }
}

performHealthCheck().catch(error => {
  console.error('❌ Health check failed:', error);
  process.exit(1);
});
