#!/usr/bin/env node
/**
 * Chat CLI
 *
 * Connects to the local relay, prints inbound chat and sends each line
 * typed on stdin. Type `exit` or press Ctrl+C to quit.
 */

import readline from 'readline';
import { config } from './config.js';
import { env } from './env.js';
import { RelayChatClient } from './relay/chat-client.js';
import { toErrorMessage } from './utils/errors.js';

async function main(): Promise<void> {
  const client = new RelayChatClient({
    url: env.RELAY_URL ?? config.relay.url,
    policy: {
      maxAttempts: config.relay.maxReconnectAttempts,
      baseDelayMs: config.relay.reconnectDelayMs,
    },
    connectGraceMs: config.relay.connectGraceMs,
    log: env.DEBUG ? (msg) => console.error(msg) : () => {},
  });

  client.onChatMessage((sender, message) => {
    console.log(`[${sender || 'unknown'}] ${message}`);
  });
  client.onConnectionChange((connected) => {
    console.log(connected ? 'Connected to chat relay!' : 'Disconnected from chat relay');
  });

  const connected = await client.connect();
  if (!connected) {
    console.log('Could not connect to chat relay yet, retrying in the background.');
  }

  console.log('Listening for chat messages. Type a message to send, "exit" to quit.');

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: '> ' });
  rl.prompt();

  rl.on('line', (line) => {
    const message = line.trim();
    if (message.toLowerCase() === 'exit') {
      rl.close();
      return;
    }
    if (message) {
      client.send(message).catch((error: unknown) => {
        console.error(`Send failed: ${toErrorMessage(error)}`);
      });
    }
    rl.prompt();
  });

  rl.on('SIGINT', () => rl.close());

  rl.on('close', () => {
    console.log('Exiting...');
    client.disconnect();
  });
}

main().catch((error: unknown) => {
  console.error('Failed to start:', toErrorMessage(error));
  process.exit(1);
});
