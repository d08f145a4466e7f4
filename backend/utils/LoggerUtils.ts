/**
 * Tagged console logger used across the pipeline.
 * Debug lines are enabled via the LOG_PIPELINE_DEBUG environment variable.
 */
export class PipelineLogger {
    constructor(private readonly tag: string) {}

    private static isDebugEnabled(): boolean {
        return process.env.LOG_PIPELINE_DEBUG === 'true' || process.env.DEBUG_PIPELINE === 'true';
    }

    private format(icon: string, message: string, data?: unknown): string {
        const dataStr = data === undefined ? '' : ` | ${JSON.stringify(data)}`;
        return `${icon} [${this.tag}] ${message}${dataStr}`;
    }

    public info(message: string, data?: unknown) {
        console.log(this.format('📄', message, data));
    }

    public success(message: string, data?: unknown) {
        console.log(this.format('✅', message, data));
    }

    public warn(message: string, data?: unknown) {
        console.warn(this.format('⚠️', message, data));
    }

    public error(message: string, error?: unknown) {
        const detail = error instanceof Error ? error.message : error;
        console.error(this.format('❌', message, detail));
    }

    /**
     * Logs a message only if pipeline debugging is enabled.
     */
    public debug(message: string, data?: unknown) {
        if (PipelineLogger.isDebugEnabled()) {
            const timestamp = new Date().toISOString().split('T')[1].split('.')[0];
            console.log(`🔍 [${timestamp}][${this.tag}] ${message}${data === undefined ? '' : ` | ${JSON.stringify(data)}`}`);
        }
    }
}

export function createLogger(tag: string): PipelineLogger {
    return new PipelineLogger(tag);
}
