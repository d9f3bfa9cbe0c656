import { beforeAll, afterAll } from 'vitest';
import { setGlobalDispatcher, getGlobalDispatcher, MockAgent } from 'undici';

// Every test file runs with outbound connections disabled; files that talk
// to a fake GROBID install their own MockAgent on top (see support/mockAgent.ts).
const originalDispatcher = getGlobalDispatcher();
const guardAgent = new MockAgent();

beforeAll(() => {
  guardAgent.disableNetConnect();
  setGlobalDispatcher(guardAgent);
});

afterAll(async () => {
  setGlobalDispatcher(originalDispatcher);
  await guardAgent.close();
});
