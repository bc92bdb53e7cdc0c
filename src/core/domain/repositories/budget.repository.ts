// src/core/domain/repositories/budget.repository.ts
import { BudgetEntity } from '../entities/budget.entity';
import { BudgetPeriodType } from '../../../shared/types/common.types';

export interface BudgetRepository {
    /** Insert or replace the budget for (category, period). */
    save(budget: BudgetEntity): Promise<BudgetEntity>;
    find(category: string, period: BudgetPeriodType): Promise<BudgetEntity | null>;
    findAll(period?: BudgetPeriodType): Promise<BudgetEntity[]>;
    delete(category: string, period: BudgetPeriodType): Promise<boolean>;
}
