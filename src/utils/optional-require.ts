import Logger from '../core/logger';

const logger = new Logger('Optional');

/**
 * Load a package listed under optionalDependencies. Resolves to null when it
 * is not installed, so the feature built on it can be switched off.
 */
export function optionalRequire(moduleName: string, featureName: string): unknown {
    try {
        return require(moduleName);
    } catch (err: unknown) {
        if (err && typeof err === 'object' && 'code' in err && err.code === 'MODULE_NOT_FOUND') {
            logger.warn(
                `"${moduleName}" is not installed; ${featureName} unavailable. ` +
                `Install with: npm install ${moduleName}`
            );
            return null;
        }
        throw err;
    }
}
