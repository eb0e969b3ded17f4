// Normalize method names as described in open()
// https://xhr.spec.whatwg.org/#the-open()-method
export const upperCaseMethods = [
  'DELETE',
  'GET',
  'HEAD',
  'OPTIONS',
  'POST',
  'PUT',
];
const upperCaseMethodsRegEx = new RegExp(`^(${upperCaseMethods.join('|')})$`, 'i');

/**
 * See https://fetch.spec.whatwg.org/#concept-method-normalize
 *
 * @param method HTTP method name
 * @returns normalized method name
 */
export function normalizeHTTPMethodName(method: string) {
  if (upperCaseMethodsRegEx.test(method)) {
    method = method.toUpperCase();
  }
  return method;
}

/**
 * See https://fetch.spec.whatwg.org/#concept-method
 *
 * @param method method name
 * @returns whether the method is a token
 */
export function isRequestMethod(method: string) {
  return /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/.test(method);
}

/**
 * See https://fetch.spec.whatwg.org/#forbidden-method
 *
 * @param method method name
 * @returns whether the request method is forbidden for XMLHttpRequest
 */
export function isRequestMethodForbidden(method: string) {
  return /^(CONNECT|TRACE|TRACK)$/i.test(method);
}

/**
 * Throw an Error whose name carries the DOM exception kind ('InvalidStateError', etc.)
 *
 * @param type Exception name
 * @param text Message
 */
export function throwError(type: string, text = ''): never {
  const exception = new Error(text);
  exception.name = type;
  throw exception;
}

/**
 * Throw for transport implementations that break the transfer contract.
 *
 * @param text Message
 */
export function throwTransportUsageError(text: string): never {
  throw new Error(`Transport usage error detected: ${text}`);
}
