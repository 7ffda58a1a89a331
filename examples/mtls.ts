import { initRemoteModel, parseConnectionInfo } from '../src';
import { parseArgs } from './utils/args';
import { greetingSignature } from './utils/greeting-model';

async function main() {
  const args = parseArgs();

  // Connection block as it appears in a runtime configuration file
  const connection = parseConnectionInfo({
    hostname: args.host,
    port: args.port,
    protocol: args.protocol,
    timeout_ms: 5000,
    tls: {
      enabled: true,
      mtls: true,
      ca_file: args.caPath,
      cert_file: args.certPath,
      key_file: args.keyPath
    }
  });

  console.log('Connection:');
  console.log(`  Host:      ${connection.host}`);
  console.log(`  Port:      ${connection.port}`);
  console.log(`  Protocol:  ${connection.protocol}`);
  console.log(`  CA Path:   ${connection.tls?.caFile}`);
  console.log(`  Cert Path: ${connection.tls?.certFile}`);
  console.log(`  Key Path:  ${connection.tls?.keyFile}`);

  const model = initRemoteModel(greetingSignature, connection);
  try {
    const output = await model.greet({ name: 'mTLS' });
    console.log(`\nGot "${output.greeting}"`);
  } finally {
    await model.close();
  }
}

main().catch(error => {
  console.error('Error:', error);
  process.exit(1);
});
