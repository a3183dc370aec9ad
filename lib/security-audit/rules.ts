/**
 *  Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
 *
 *  Licensed under the Apache License, Version 2.0 (the "License"). You may not use this file except in compliance
 *  with the License. A copy of the License is located at
 *
 *      http://www.apache.org/licenses/LICENSE-2.0
 *
 *  or in the 'license' file accompanying this file. This file is distributed on an 'AS IS' BASIS, WITHOUT WARRANTIES
 *  OR CONDITIONS OF ANY KIND, express or implied. See the License for the specific language governing permissions
 *  and limitations under the License.
 */

/**
 * @fileoverview Security Rules - Checks applied to every method of an audited REST API
 *
 * | Rule                     | Severity | Trigger                                                       |
 * |--------------------------|----------|---------------------------------------------------------------|
 * | OPEN_METHOD              | HIGH     | no authorization and no API key (OPTIONS excluded)            |
 * | API_KEY_ONLY             | MEDIUM   | API key is the only protection (OPTIONS excluded)             |
 * | MISSING_AUTHORIZER       | HIGH     | Cognito or custom authorization without an authorizer id      |
 * | AUTHORIZER_NOT_FOUND     | HIGH     | the referenced authorizer does not exist                      |
 * | AUTHORIZER_TYPE_MISMATCH | MEDIUM   | authorization type does not match the authorizer type         |
 * | CORS_WILDCARD_ORIGIN     | LOW      | OPTIONS answers `Access-Control-Allow-Origin: '*'`            |
 */

import { FindingSeverity, IMethodEvaluationContext, ISecurityFinding, SecurityRuleId } from './interfaces';

const COGNITO_AUTHORIZATION = 'COGNITO_USER_POOLS';
const CUSTOM_AUTHORIZATION = 'CUSTOM';
const ALLOW_ORIGIN_PARAMETER = 'method.response.header.Access-Control-Allow-Origin';
const WILDCARD_ORIGIN = "'*'";

interface ISecurityRule {
  id: SecurityRuleId;
  severity: FindingSeverity;
  /** Returns the finding description when the rule is violated */
  check: (context: IMethodEvaluationContext) => string | undefined;
}

function authorizationTypeOf(context: IMethodEvaluationContext): string {
  return context.method.authorizationType ?? 'NONE';
}

export const SECURITY_RULES: ISecurityRule[] = [
  {
    id: SecurityRuleId.OPEN_METHOD,
    severity: 'HIGH',
    check: context => {
      if (
        context.httpMethod === 'OPTIONS' ||
        authorizationTypeOf(context) !== 'NONE' ||
        context.method.apiKeyRequired
      ) {
        return undefined;
      }
      return 'Method has no authorization and does not require an API key';
    },
  },
  {
    id: SecurityRuleId.API_KEY_ONLY,
    severity: 'MEDIUM',
    check: context => {
      if (
        context.httpMethod === 'OPTIONS' ||
        authorizationTypeOf(context) !== 'NONE' ||
        !context.method.apiKeyRequired
      ) {
        return undefined;
      }
      return 'Method is protected by an API key only';
    },
  },
  {
    id: SecurityRuleId.MISSING_AUTHORIZER,
    severity: 'HIGH',
    check: context => {
      const authorizationType = authorizationTypeOf(context);
      if (
        (authorizationType === COGNITO_AUTHORIZATION || authorizationType === CUSTOM_AUTHORIZATION) &&
        !context.method.authorizerId
      ) {
        return `Method uses ${authorizationType} authorization without an authorizer`;
      }
      return undefined;
    },
  },
  {
    id: SecurityRuleId.AUTHORIZER_NOT_FOUND,
    severity: 'HIGH',
    check: context => {
      if (context.method.authorizerId && context.authorizer === null) {
        return `Authorizer ${context.method.authorizerId} does not exist`;
      }
      return undefined;
    },
  },
  {
    id: SecurityRuleId.AUTHORIZER_TYPE_MISMATCH,
    severity: 'MEDIUM',
    check: context => {
      const authorizer = context.authorizer;
      if (!authorizer) {
        return undefined;
      }
      const authorizationType = authorizationTypeOf(context);
      const cognitoAuthorizer = authorizer.type === COGNITO_AUTHORIZATION;
      if (
        (authorizationType === COGNITO_AUTHORIZATION && !cognitoAuthorizer) ||
        (authorizationType === CUSTOM_AUTHORIZATION && cognitoAuthorizer)
      ) {
        const authorizerType = authorizer.type ?? 'UNKNOWN';
        return `Method uses ${authorizationType} authorization but authorizer ${authorizer.id} is of type ${authorizerType}`;
      }
      return undefined;
    },
  },
  {
    id: SecurityRuleId.CORS_WILDCARD_ORIGIN,
    severity: 'LOW',
    check: context => {
      if (context.httpMethod !== 'OPTIONS') {
        return undefined;
      }
      const responses = Object.values(context.method.methodIntegration?.integrationResponses ?? {});
      if (responses.some(response => response.responseParameters?.[ALLOW_ORIGIN_PARAMETER] === WILDCARD_ORIGIN)) {
        return 'CORS allows any origin';
      }
      return undefined;
    },
  },
];

/**
 * Applies every rule to one method
 */
export function evaluateMethod(context: IMethodEvaluationContext): ISecurityFinding[] {
  const findings: ISecurityFinding[] = [];
  for (const rule of SECURITY_RULES) {
    const description = rule.check(context);
    if (description === undefined) {
      continue;
    }
    findings.push({
      apiId: context.apiId,
      apiName: context.apiName,
      resourcePath: context.resourcePath,
      httpMethod: context.httpMethod,
      ruleId: rule.id,
      severity: rule.severity,
      authorizationType: authorizationTypeOf(context),
      authorizerId: context.method.authorizerId,
      authorizerName: context.authorizer?.name,
      description,
    });
  }
  return findings;
}
