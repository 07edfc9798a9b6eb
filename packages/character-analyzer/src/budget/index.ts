export {
  PASS_BUDGETS,
  PassTokenBudget,
  type PassBudgetName,
  type PassTokenBudgetParts,
} from './pass-token-budget';
export { TokenBudgetManager } from './token-budget-manager';
