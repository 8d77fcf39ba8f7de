/**
 * Rules Module - Barrel Export
 */

export { RuleService, type RuleServiceDependencies } from './rule-service';
export {
  intervalRuleListSchema,
  intervalRuleSchema,
  intervalUpdateListSchema,
  intervalUpdateSchema,
} from './schemas';
