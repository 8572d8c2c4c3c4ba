
/**
 * Tagged console logging for pipeline stages.
 * Debug lines are enabled via LOG_LEVEL=debug.
 */
export class PipelineLogger {
    private static toStderr = false;

    private static isDebugEnabled(): boolean {
        return (process.env.LOG_LEVEL || '').toLowerCase() === 'debug';
    }

    private static timestamp(): string {
        return new Date().toISOString().split('T')[1].split('.')[0];
    }

    private static format(icon: string, tag: string, message: string): string {
        return `${icon} [${this.timestamp()}][${tag}] ${message}`;
    }

    /**
     * Send every level to stderr, so stdout only carries command output.
     */
    public static redirectToStderr(enabled = true) {
        this.toStderr = enabled;
    }

    public static info(tag: string, message: string) {
        const line = this.format('🔄', tag, message);
        if (this.toStderr) {
            console.error(line);
        } else {
            console.log(line);
        }
    }

    public static success(tag: string, message: string) {
        const line = this.format('✅', tag, message);
        if (this.toStderr) {
            console.error(line);
        } else {
            console.log(line);
        }
    }

    public static warn(tag: string, message: string) {
        console.warn(this.format('⚠️', tag, message));
    }

    public static error(tag: string, message: string, error?: unknown) {
        const detail = error === undefined ? '' : ` | ${error instanceof Error ? error.message : String(error)}`;
        console.error(this.format('❌', tag, `${message}${detail}`));
    }

    /**
     * Logs only when debug logging is enabled.
     * @param data Optional metadata, serialised as JSON
     */
    public static debug(tag: string, message: string, data?: unknown) {
        if (this.isDebugEnabled()) {
            const dataStr = data === undefined ? '' : ` | ${JSON.stringify(data)}`;
            console.error(this.format('🔍', tag, `${message}${dataStr}`));
        }
    }
}
