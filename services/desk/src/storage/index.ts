import type { CustomerStore } from '../contracts/customerStore';
import { config } from '../config';
import { MemoryCustomerStore } from './memoryCustomerStore';
import { RedisCustomerStore } from './redisCustomerStore';
import { getRedis } from '../redis/client';

let _store: CustomerStore | null = null;

export function getCustomerStore(): CustomerStore {
  if (_store) return _store;

  switch (config.store.driver) {
    case 'redis':
      _store = new RedisCustomerStore(getRedis(), config.store.keyPrefix);
      return _store;
    case 'memory':
      _store = new MemoryCustomerStore();
      return _store;
    default:
      throw new Error(`Unsupported store driver: ${String(config.store.driver)}`);
  }
}
