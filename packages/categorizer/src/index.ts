export {
  NullRuleEvaluator,
  ScriptRuleEvaluator,
  createRuleEvaluator,
  loadRuleEvaluator,
  type RuleEvaluator,
  type ScriptOptions,
} from './rule-evaluator.js';
export { toScriptView, type EvaluationContext, type ScriptTransactionView } from './script-view.js';
