import { MockAgent, setGlobalDispatcher, getGlobalDispatcher, type Dispatcher } from "undici";
import { parseConfig, type AdapterConfig } from "../config.js";

export const STORE_ORIGIN = "https://shop.test";
export const API_PREFIX = "/wp-json/wc/v3";
export const TEST_KEY = "ck_test";
export const TEST_SECRET = "cs_test";
export const BASIC_AUTH = `Basic ${Buffer.from(`${TEST_KEY}:${TEST_SECRET}`).toString("base64")}`;

export function testConfig(overrides: Record<string, unknown> = {}): AdapterConfig {
  return parseConfig({
    store_url: STORE_ORIGIN,
    consumer_key: TEST_KEY,
    consumer_secret: TEST_SECRET,
    api_version: "wc/v3",
    ...overrides,
  });
}

export interface MockStore {
  agent: MockAgent;
  pool: ReturnType<MockAgent["get"]>;
  restore(): Promise<void>;
}

/** Routes undici requests to an in-process MockAgent; real connections are refused. */
export function mockStore(): MockStore {
  const original: Dispatcher = getGlobalDispatcher();
  const agent = new MockAgent();
  agent.disableNetConnect();
  setGlobalDispatcher(agent);

  return {
    agent,
    pool: agent.get(STORE_ORIGIN),
    async restore() {
      setGlobalDispatcher(original);
      await agent.close();
    },
  };
}

export const JSON_HEADERS = { headers: { "content-type": "application/json" } };

export function products(count: number, firstId = 1) {
  return Array.from({ length: count }, (_, i) => ({
    id: firstId + i,
    name: `Test Product ${firstId + i}`,
    status: "publish",
    price: "10.00",
  }));
}
