import * as errors from '../errors/errors-index.js';
import { Endpoint, EndpointHandlerPayload } from './router-definitions.js';

/**
 * Executes an endpoint's definition in the correct lifecycle order:
 *  Validations are checked. A {@link ValidationError} is thrown if validations fail.
 *  The handler is called with the validated payload.
 */
export const executeEndpoint = async <I, O, C, P extends EndpointHandlerPayload<I, C>>(
  endpoint: Endpoint<I, O, C, P>,
  payload: P
) => {
  const validation_response = endpoint.validator?.validate(payload.params);
  if (validation_response && !validation_response.valid) {
    throw new errors.ValidationError(validation_response.errors);
  }

  return endpoint.handler(payload);
};
