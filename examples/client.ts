// Mint API client -- example
//
// Walks through a mint cycle against a running server:
//   1. Read the API banner (GET /)
//   2. Inspect the authority (GET /authority)
//   3. Mint one token (POST /MintNFT)
//   4. Resolve its metadata pointer and the receiver's balance
//   5. Mint a two-item batch (POST /MintNFTBatch)
//
// Usage:
//   RECEIVER=0x... tsx examples/client.ts
//
// Environment variables:
//   RECEIVER    (required) -- address that receives the minted tokens
//   SERVER_URL  (optional) -- Mint API URL (default: http://localhost:3000)

import { MintApiError, MintClient } from '../src/sdk/index.js';

const SERVER_URL = process.env.SERVER_URL ?? 'http://localhost:3000';

async function main(): Promise<void> {
  const receiver = process.env.RECEIVER;
  if (!receiver) {
    console.error('ERROR: RECEIVER environment variable is required.');
    process.exit(1);
  }

  const client = new MintClient({ baseUrl: SERVER_URL });

  const info = await client.info();
  console.log(`[1] ${info.message}`);

  const authority = await client.authority();
  console.log(`[2] Authority ${authority.address} (admin ${authority.admin})`);
  console.log(`    Minters: ${authority.minters.join(', ')}`);

  const minted = await client.mint({
    name: 'Example Token',
    img: 'https://example.com/token.png',
    ethAddress: receiver,
    description: 'Minted by the example client',
  });
  console.log(`[3] Minted token ${minted.tokenId} -> ${minted.receiver}`);

  const token = await client.token(minted.tokenId);
  const balance = await client.balance(minted.tokenId, receiver);
  console.log(`[4] uri=${token.uri} balance=${balance.balance}`);

  const batch = await client.mintBatch({
    ethAddress: receiver,
    items: [
      { name: 'Edition A', img: 'https://example.com/a.png', description: 'First', quantity: 10 },
      { name: 'Edition B', img: 'https://example.com/b.png', description: 'Second', quantity: 5 },
    ],
  });
  console.log(`[5] Batch ids: ${batch.tokens.map((t) => t.tokenId).join(', ')}`);
}

main().catch((err) => {
  if (err instanceof MintApiError) {
    console.error(`Request rejected (${err.status} ${err.code ?? 'no code'}): ${err.message}`);
  } else {
    console.error('Fatal error:', err);
  }
  process.exit(1);
});
