/**
 * Package version, reported by `tunny --version`
 * Keep in step with package.json.
 */
export const VERSION = '1.0.0';
