import { Injectable } from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import type { Model } from "mongoose";
import { AuditLogEntity } from "./audit-log.schema";

export interface AuditLogInput {
  eventType: string;
  actorType: "user" | "system";
  actorId?: string;
  outcome: "succeeded" | "failed";
  resourceType: string;
  resourceId?: string;
  metadata?: Record<string, unknown>;
}

@Injectable()
export class AuditLogService {
  constructor(
    @InjectModel(AuditLogEntity.name)
    private readonly auditLogModel: Model<AuditLogEntity>
  ) {}

  async record(entry: AuditLogInput) {
    await this.auditLogModel.create(entry);
  }
}
