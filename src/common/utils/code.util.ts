const CODE_CHARS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

/**
 * Generate a human-readable reference code
 * Format: {prefix}-XXXXXXXX (uppercase alphanumeric)
 */
export function generateCode(prefix: string, length: number = 8): string {
  let code = `${prefix}-`;
  for (let i = 0; i < length; i++) {
    code += CODE_CHARS.charAt(Math.floor(Math.random() * CODE_CHARS.length));
  }
  return code;
}
