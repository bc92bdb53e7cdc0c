export * from './base.exception';
export * from './infrastructure.exception';
export * from './money.exception';
export * from './not-found.exception';
export * from './validation.exception';
