import type { AnyRuleDefinition } from './types.js';
import { componentSelectorRule } from './angular/component_selector.js';
import { lifecycleInterfaceRule } from './angular/lifecycle_interface.js';
import { noEventEmitterInServiceRule } from './angular/no_eventemitter_in_service.js';
import { noOutputOnPrefixRule } from './angular/no_output_on_prefix.js';
import { subscriptionCleanupRule } from './angular/subscription_cleanup.js';
import { actionTypeFormatRule } from './ngrx/action_type_format.js';
import { noDispatchInEffectsRule } from './ngrx/no_dispatch_in_effects.js';
import { noInlineSelectorRule } from './ngrx/no_inline_selector.js';
import { noReducerMutationRule } from './ngrx/no_reducer_mutation.js';
import { finnishNotationRule } from './rxjs/finnish_notation.js';
import { noExposedSubjectRule } from './rxjs/no_exposed_subject.js';
import { noNestedSubscribeRule } from './rxjs/no_nested_subscribe.js';
import { takeUntilLastRule } from './rxjs/takeuntil_last.js';

export const BUILTIN_RULES: readonly AnyRuleDefinition[] = [
  componentSelectorRule,
  lifecycleInterfaceRule,
  noOutputOnPrefixRule,
  noEventEmitterInServiceRule,
  subscriptionCleanupRule,
  noNestedSubscribeRule,
  finnishNotationRule,
  noExposedSubjectRule,
  takeUntilLastRule,
  actionTypeFormatRule,
  noDispatchInEffectsRule,
  noInlineSelectorRule,
  noReducerMutationRule,
];
