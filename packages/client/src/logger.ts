/**
 * Sistema de logging básico para soapwire
 *
 * Los logs de debug solo se muestran cuando se activa el modo debug,
 * con setDebugMode(true) o la variable de entorno SOAPWIRE_DEBUG=1.
 * Los errores de una llamada nunca se registran aquí: se rechazan al llamador.
 */

function debugFromEnv(): boolean {
    const value = process.env['SOAPWIRE_DEBUG']?.trim().toLowerCase();
    return value === '1' || value === 'true';
}

let debugMode = debugFromEnv();

/**
 * Activa o desactiva el modo debug
 */
export function setDebugMode(enabled: boolean): void {
    debugMode = enabled;
}

/**
 * Verifica si el modo debug está activo
 */
export function isDebugMode(): boolean {
    return debugMode;
}

/**
 * Log de debug (solo visible si el modo debug está activo)
 */
export function debug(message: string): void {
    if (debugMode) {
        console.log(`[DEBUG] ${message}`);
    }
}

/**
 * Log de debug con contexto específico (solo visible si el modo debug está activo)
 */
export function debugContext(context: string, message: string): void {
    if (debugMode) {
        console.log(`[DEBUG ${context}] ${message}`);
    }
}
