/**
 * Secret Provider Interface
 *
 * A provider looks up a logical secret name (e.g. "KRB5_SVC_PASSWORD") in one
 * source. SecretResolver asks each provider in turn until one answers.
 */

export interface ISecretProvider {
  /**
   * Look up a secret
   *
   * @returns the secret, or undefined so the next provider is tried
   * @throws only for unexpected failures; "not found" is undefined
   */
  resolve(logicalName: string): Promise<string | undefined>;
}

export function isSecretProvider(value: unknown): value is ISecretProvider {
  return (
    typeof value === 'object' &&
    value !== null &&
    'resolve' in value &&
    typeof value.resolve === 'function'
  );
}
