import { Injectable, OnModuleDestroy } from "@nestjs/common";
import Redis from "ioredis";

export const DEFAULT_REDIS_URL = "redis://localhost:6379";

@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly client: Redis;

  constructor() {
    this.client = new Redis(process.env.REDIS_URL ?? DEFAULT_REDIS_URL, {
      maxRetriesPerRequest: null,
      enableReadyCheck: false,
      lazyConnect: true
    });
  }

  getClient(): Redis {
    return this.client;
  }

  async onModuleDestroy() {
    if (this.client.status === "end" || this.client.status === "close" || this.client.status === "wait") {
      return;
    }

    await this.client.quit();
  }
}
