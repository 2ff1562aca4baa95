export interface AuditEntry {
  transactionId: string;
  parentTransactionId?: string;
  operation: string;
  userId: string;
  metadata: Record<string, unknown>;
  createdAt: Date;
}
