export default {
  spec: './specs/starknet-subset.json',
  targets: [],
  dns: {},
  strictDns: false,
  suiteDir: './suites',
  filePattern: '\\.suite\\.',
  tags: [],
  concurrency: 8,
  rps: 0,
  timeout: 30000,
  retries: 3,
  caseRetries: 1,
  exhaustive: true,
  divergence: 'record',
  verbose: false,
  feltSchemas: ['FELT'],
  monotonic: [],
};
