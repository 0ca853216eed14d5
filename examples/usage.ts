import { EconopsClient } from '../src/index.js';

async function main(): Promise<void> {
  const client = new EconopsClient({ token: process.env.ECONOPS_TOKEN ?? 'your_api_token' });

  try {
    console.log('=== PCA ===');
    const pca = await client.request('/compute/pca', {
      data: [
        [1, 2, 3],
        [4, 5, 6],
        [7, 8, 9],
      ],
      n_components: 2,
    });
    if (pca.status === 200) {
      console.log('Explained variance:', JSON.stringify(pca.data, null, 2));
    } else {
      console.log(`Error: ${pca.status}\n${pca.body}`);
    }

    console.log('\n=== Prophet forecast ===');
    const forecast = await client.request('/compute/ts/prophet', {
      dates: ['2023-01-01', '2023-01-02', '2023-01-03', '2023-01-04', '2023-01-05'],
      values: [10, 12, 11, 13, 15],
      forecast_periods: 3,
    });
    if (forecast.status === 200) {
      console.log(JSON.stringify(forecast.data, null, 2));
    } else {
      console.log(`Error: ${forecast.status}\n${forecast.body}`);
    }

    console.log('\n=== Cache ===');
    const info = await client.cacheInfo();
    console.log(`Cache directory: ${info.directory}`);
    console.log(`Cached requests: ${info.count}`);
    console.log(`Cache size (bytes): ${info.totalBytes}`);
  } finally {
    await client.close();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
