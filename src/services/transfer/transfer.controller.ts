import { Response, NextFunction } from 'express';

import { authService } from '../../auth/auth.service';
import { AuthRequest } from '../../auth/auth.types';
import { QueryService } from '../query/query.service';
import { TransferRecord } from './transfer.journal';

interface TransferDTO {
  transferId: string;
  kind: string;
  entityType: string;
  entityId: string;
  amount: string;
  fee: string;
  memo: string;
  createdAtTime: string;
  status: string;
  blockIndex: string | null;
  reason: string | null;
  createdAt: string;
  updatedAt: string;
}

export class TransferController {
  constructor(private readonly queries: QueryService) {}

  private toTransferDTO(record: TransferRecord): TransferDTO {
    return {
      transferId: record.transferId,
      kind: record.kind,
      entityType: record.entityType,
      entityId: record.entityId,
      amount: record.amount.toString(),
      fee: record.fee.toString(),
      memo: record.memo,
      createdAtTime: record.createdAtTime.toString(),
      status: record.status,
      blockIndex: record.blockIndex === undefined ? null : record.blockIndex.toString(),
      reason: record.reason ?? null,
      createdAt: new Date(record.createdAt).toISOString(),
      updatedAt: new Date(record.updatedAt).toISOString(),
    };
  }

  /**
   * The caller's transfers awaiting reconciliation
   * GET /transfers/unreconciled
   */
  async listUnreconciled(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = authService.requireCaller(req);

      const transfers = this.queries.listUnreconciledTransfers(caller);

      res.status(200).json({
        success: true,
        data: {
          transfers: transfers.map((record) => this.toTransferDTO(record)),
        },
      });
    } catch (error) {
      next(error);
    }
  }
}
