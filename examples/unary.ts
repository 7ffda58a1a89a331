import { initRemoteModel, RemoteError, type RemoteConnection } from '../src';
import { parseArgs } from './utils/args';
import { greetingSignature } from './utils/greeting-model';

async function main() {
  const args = parseArgs();

  // Create connection descriptor
  const connection: RemoteConnection = {
    host: args.host,
    port: args.port,
    protocol: args.protocol,
    timeoutMs: 5000
  };

  // Add TLS configuration if enabled
  if (args.useTls) {
    connection.tls = { enabled: true, caFile: args.caPath };
  }

  console.log('Connection:');
  console.log(`  Host:      ${connection.host}`);
  console.log(`  Port:      ${connection.port}`);
  console.log(`  Protocol:  ${connection.protocol}`);
  console.log(`  TLS:       ${args.useTls ? 'enabled' : 'disabled'}`);

  const model = initRemoteModel(greetingSignature, connection);

  try {
    console.log('\n1. Unary call');
    const start = process.hrtime.bigint();
    const output = await model.greet({ name: 'World' });
    const elapsed = Number(process.hrtime.bigint() - start) / 1_000_000;
    console.log(`Got "${output.greeting}" in ${elapsed.toFixed(2)} ms`);

    console.log('\n2. Unary call with a tight deadline');
    try {
      await model.greet({ name: 'Hurry' }, { timeoutMs: 1 });
      console.log('Finished within 1 ms');
    } catch (error) {
      console.log(`Failed as expected: ${error instanceof Error ? error.message : String(error)}`);
    }

    console.log('\n3. Unary call the model rejects');
    try {
      await model.greet({ name: '' });
      console.log('Model accepted an empty name');
    } catch (error) {
      if (!(error instanceof RemoteError)) {
        throw error;
      }
      console.log(`Remote error (status ${error.status}): ${error.message}`);
    }
  } finally {
    await model.close();
  }
}

main().catch(error => {
  console.error('Error:', error);
  process.exit(1);
});
