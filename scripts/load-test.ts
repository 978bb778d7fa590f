import autocannon from 'autocannon';

const url = process.env.API_URL || 'http://localhost:3000';
const threshold = parseInt(process.env.LOAD_TEST_THRESHOLD_MS || '200', 10);

// 429s are expected once the layered limits kick in; only 5xx count as failures
const endpoints = [
  '/status',
  '/api/info',
  '/api/v1/weather/summary?locations=51.5074,-0.1278&temperature=20&unit=celsius',
  '/api/v1/weather/locations/51.5074,-0.1278',
];

async function run(endpoint: string): Promise<boolean> {
  console.log(`Running load test for ${url}${endpoint}`);
  const result = await autocannon({
    url: url + endpoint,
    connections: 5,
    duration: 30,
  });

  console.log(autocannon.printResult(result));

  if (result['5xx'] > 0) {
    console.error(`❌ ${endpoint} returned ${result['5xx']} server errors`);
    return false;
  }
  if (result.latency.p97_5 > threshold) {
    console.error(
      `❌ ${endpoint} p97.5 latency ${result.latency.p97_5}ms exceeds threshold ${threshold}ms`,
    );
    return false;
  }

  console.log(`✅ ${endpoint} p97.5 latency ${result.latency.p97_5}ms`);
  return true;
}

async function main(): Promise<void> {
  let passed = true;
  for (const endpoint of endpoints) {
    passed = (await run(endpoint)) && passed;
  }
  if (!passed) {
    process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
