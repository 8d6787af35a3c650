import type { KeywordHandler } from './types.js';
import {
  constraintAdditionalItems,
  constraintContains,
  constraintItems,
  constraintMaxContains,
  constraintMaxItems,
  constraintMinContains,
  constraintMinItems,
  constraintPrefixItems,
  constraintUniqueItems,
} from './array.js';
import {
  constraintAllOf,
  constraintAnyOf,
  constraintElse,
  constraintIf,
  constraintNot,
  constraintOneOf,
  constraintThen,
} from './combinator.js';
import { constraintFormat } from './format.js';
import {
  constraintConst,
  constraintContent,
  constraintDefault,
  constraintDeprecated,
  constraintDescription,
  constraintEnum,
  constraintExamples,
  constraintNullable,
  constraintSchema,
  constraintTitle,
  constraintType,
} from './generic.js';
import {
  constraintEmbeddedResource,
  constraintGroupVersionKind,
  constraintIntOrString,
  constraintPreserveUnknownFields,
} from './kubernetes.js';
import {
  constraintExclusiveMaximum,
  constraintExclusiveMinimum,
  constraintMaximum,
  constraintMinimum,
  constraintMultipleOf,
} from './numeric.js';
import {
  constraintAdditionalProperties,
  constraintMaxProperties,
  constraintMinProperties,
  constraintPatternProperties,
  constraintProperties,
  constraintPropertyNames,
  constraintRequired,
} from './object.js';
import { constraintAddDefinitions, constraintID, constraintRef } from './reference.js';
import { constraintMaxLength, constraintMinLength, constraintPattern } from './string.js';

export type { KeywordHandler } from './types.js';

/**
 * Handlers for every keyword the tables mark as implemented. Phases and
 * applicable versions live in the tables, not here.
 */
export const HANDLERS: Readonly<Record<string, KeywordHandler>> = {
  $defs: constraintAddDefinitions,
  $id: constraintID,
  $ref: constraintRef,
  $schema: constraintSchema,
  additionalItems: constraintAdditionalItems,
  additionalProperties: constraintAdditionalProperties,
  allOf: constraintAllOf,
  anyOf: constraintAnyOf,
  const: constraintConst,
  contains: constraintContains,
  contentEncoding: constraintContent,
  contentMediaType: constraintContent,
  default: constraintDefault,
  definitions: constraintAddDefinitions,
  deprecated: constraintDeprecated,
  description: constraintDescription,
  else: constraintElse,
  enum: constraintEnum,
  examples: constraintExamples,
  exclusiveMaximum: constraintExclusiveMaximum,
  exclusiveMinimum: constraintExclusiveMinimum,
  format: constraintFormat,
  id: constraintID,
  if: constraintIf,
  items: constraintItems,
  maxContains: constraintMaxContains,
  maxItems: constraintMaxItems,
  maxLength: constraintMaxLength,
  maxProperties: constraintMaxProperties,
  maximum: constraintMaximum,
  minContains: constraintMinContains,
  minItems: constraintMinItems,
  minLength: constraintMinLength,
  minProperties: constraintMinProperties,
  minimum: constraintMinimum,
  multipleOf: constraintMultipleOf,
  not: constraintNot,
  nullable: constraintNullable,
  oneOf: constraintOneOf,
  pattern: constraintPattern,
  patternProperties: constraintPatternProperties,
  prefixItems: constraintPrefixItems,
  properties: constraintProperties,
  propertyNames: constraintPropertyNames,
  required: constraintRequired,
  then: constraintThen,
  title: constraintTitle,
  type: constraintType,
  uniqueItems: constraintUniqueItems,
  'x-kubernetes-embedded-resource': constraintEmbeddedResource,
  'x-kubernetes-group-version-kind': constraintGroupVersionKind,
  'x-kubernetes-int-or-string': constraintIntOrString,
  'x-kubernetes-preserve-unknown-fields': constraintPreserveUnknownFields,
};
