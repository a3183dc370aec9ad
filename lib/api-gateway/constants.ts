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

import { EndpointConnectionType, EndpointIntegrationType, PassthroughBehavior } from './interfaces';

export const DEFAULT_INTEGRATION_TIMEOUT_MS = 29000;
export const MIN_INTEGRATION_TIMEOUT_MS = 50;
export const MAX_INTEGRATION_TIMEOUT_MS = 29000;

export const DEFAULT_PASSTHROUGH_BEHAVIOR: PassthroughBehavior = 'WHEN_NO_MATCH';
export const DEFAULT_INTEGRATION_TYPE: EndpointIntegrationType = 'HTTP_PROXY';
export const DEFAULT_CONNECTION_TYPE: EndpointConnectionType = 'VPC_LINK';

export const RESPONSE_STATUS_CODE = '200';
export const RESPONSE_MODEL = 'Empty';
export const JSON_CONTENT_TYPE = 'application/json';

/** Request template of the OPTIONS mock integration */
export const CORS_MOCK_REQUEST_TEMPLATE = '{"statusCode": 200}';

export const MAX_HEADER_NAME_LENGTH = 128;
export const MAX_HEADER_VALUE_LENGTH = 1024;

/** Catalogue key that names the Cognito pool, it is not sent as a header */
export const COGNITO_POOL_HEADER = 'CognitoPool';

/** Prefix of the placeholder ids handed out for resources a dry run would create */
export const DRY_RUN_RESOURCE_ID_PREFIX = 'dry-run:';

export const OPTIONS_METHOD = 'OPTIONS';
