import { Injectable } from "@nestjs/common";

export const DEFAULT_MONGODB_URI = "mongodb://localhost:27017/ctf_arena";

export const parseBooleanEnv = (value: string | undefined, fallback: boolean): boolean => {
  const normalized = value?.trim().toLowerCase();

  if (normalized === "true" || normalized === "1") {
    return true;
  }

  if (normalized === "false" || normalized === "0") {
    return false;
  }

  return fallback;
};

export const resolveMongoUri = (value: string | undefined = process.env.MONGODB_URI): string =>
  value?.trim() || DEFAULT_MONGODB_URI;

@Injectable()
export class ArenaConfigService {
  private readonly seedChallenges: boolean;

  constructor() {
    this.seedChallenges = parseBooleanEnv(process.env.SEED_CHALLENGES, true);
  }

  shouldSeedChallenges(): boolean {
    return this.seedChallenges;
  }
}
