// src/core/domain/repositories/budget-alert.repository.ts
import { BudgetAlertEntity, NewBudgetAlert } from '../entities/budget-alert.entity';

export interface BudgetAlertRepository {
    create(alert: NewBudgetAlert): Promise<BudgetAlertEntity>;
    /** Unread alerts, newest first. */
    findUnread(): Promise<BudgetAlertEntity[]>;
    /** False when no alert has that id. */
    markRead(id: number): Promise<boolean>;
}
