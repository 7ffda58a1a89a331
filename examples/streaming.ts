import { initRemoteModel, StreamError } from '../src';
import { parseArgs } from './utils/args';
import { greetingSignature, type GreetingRequest } from './utils/greeting-model';

async function* slowNames(): AsyncGenerator<GreetingRequest> {
  for (const name of ['Ada', 'Grace', 'Edsger']) {
    await new Promise(resolve => setTimeout(resolve, 10));
    yield { name };
  }
}

async function main() {
  const args = parseArgs();
  const model = initRemoteModel(greetingSignature, {
    host: args.host,
    port: args.port,
    protocol: args.protocol,
    tls: args.useTls ? { enabled: true, caFile: args.caPath } : undefined
  });

  try {
    console.log('1. Streaming inputs');
    const combined = await model.greetAll(slowNames());
    console.log(`Got "${combined.greeting}"`);

    console.log('\n2. Streaming outputs');
    const stream = model.greetRepeatedly({ name: 'World' });
    try {
      for await (const output of stream) {
        console.log(`  #${stream.delivered}: ${output.greeting}`);
        if (stream.delivered === 5) {
          console.log('  Stopping early, the remote stream is cancelled');
          break;
        }
      }
    } catch (error) {
      if (error instanceof StreamError) {
        console.log(`Stream broke after ${error.delivered} item(s): ${error.message}`);
      } else {
        throw error;
      }
    }
  } finally {
    await model.close();
  }
}

main().catch(error => {
  console.error('Error:', error);
  process.exit(1);
});
