#!/usr/bin/env node
/**
 * Interactive chat client for a cluster node.
 */
import readline from 'readline-sync';
import * as dotenv from 'dotenv';
import { ChatClient, PostResult } from './client/chatClient';
import { describeError } from './utils/errors';

dotenv.config();

let client = new ChatClient(process.env.CHAT_NODE_URL || 'http://localhost:5000');
let user = process.env.CHAT_USER || '';

function displayMenu() {
  console.log('\n--- REPLICATED CHAT ---');
  console.log(`Node: ${client.url}`);
  console.log('Available commands:');
  console.log('/send - Send a message');
  console.log('/messages - Display the node\'s messages');
  console.log('/status - Display node and peer status');
  console.log('/node <url> - Switch to another node');
  console.log('/user <name> - Change your user name');
  console.log('/exit - Close client');
  console.log('Anything else is sent as a message.');
  console.log('-----------------------\n');
}

export function describePostResult(result: PostResult): string {
  switch (result.status) {
    case 'committed':
      return `Committed on ${result.replicas} replicas (id ${result.message.id}).`;
    case 'accepted':
      return `Accepted locally, propagating in background (id ${result.message.id}).`;
    case 'rejected':
      return `Rejected: ${result.details}`;
    case 'invalid':
      return `Not sent: ${result.details}`;
  }
}

async function send(text: string) {
  if (!text.trim()) {
    console.log('Empty message, not sent.');
    return;
  }
  const result = await client.post(text, user || undefined);
  console.log(describePostResult(result));
}

async function showMessages() {
  const listing = await client.list();
  console.log(`Messages stored on ${listing.nodeId} (${listing.count}, local view, may be stale):`);
  listing.messages.forEach((msg, i) => {
    console.log(`${i + 1}. [${new Date(msg.acceptedAt).toLocaleString()}] ${msg.user}@${msg.originNode}: ${msg.text}`);
  });
}

async function showStatus() {
  const status = await client.status();
  console.log(`Status of node ${status.nodeId}:`);
  console.log(`- Mode: ${status.mode}`);
  console.log(`- Cluster size: ${status.clusterSize} (quorum ${status.quorumSize})`);
  console.log(`- Stored messages: ${status.messages}`);
  status.peers.forEach((peer) => {
    const seen = peer.lastSeenAt ? new Date(peer.lastSeenAt).toLocaleString() : 'never';
    console.log(`- Peer ${peer.peerId}: ${peer.reachable ? 'reachable' : 'unreachable'} (last seen ${seen})`);
  });
}

async function handleCommand(command: string): Promise<boolean> {
  const [name, ...args] = command.trim().split(/\s+/);

  switch (name.toLowerCase()) {
    case '/send':
      await send(readline.question('message> '));
      break;
    case '/messages':
      await showMessages();
      break;
    case '/status':
      await showStatus();
      break;
    case '/node':
      if (args[0]) {
        client = new ChatClient(args[0]);
        console.log(`Now talking to ${client.url}`);
      } else {
        console.log('Usage: /node <url>');
      }
      break;
    case '/user':
      user = args.join(' ');
      console.log(user ? `User name set to ${user}` : 'User name cleared');
      break;
    case '/help':
      displayMenu();
      break;
    case '/exit':
      console.log('Closing client...');
      return false;
    default:
      if (command.startsWith('/')) {
        console.log('Unknown command. Type /help to see available commands.');
      } else {
        await send(command);
      }
      break;
  }
  return true;
}

async function startCLI() {
  displayMenu();

  let running = true;
  while (running) {
    const command = readline.question('> ');
    try {
      running = await handleCommand(command);
    } catch (error) {
      console.log(`Error: ${describeError(error)}`);
    }
  }
}

if (require.main === module) {
  startCLI().catch((error) => {
    console.error(describeError(error));
    process.exit(1);
  });
}
