export interface RuntimeConfig {
    /** Initial script title, until the script declares its own. */
    title?: string;
    /** Log every call dispatched through the runtime. */
    trace?: boolean;
}

export const DEFAULT_TITLE = "No Title";
