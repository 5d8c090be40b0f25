export class Debug {
    // Writes a message to the console
    public static WriteLine(message: string): void {
        console.debug(message);
    }

    // Writes a formatted string with parameters
    public static WriteFormat(format: string, ...args: unknown[]): void {
        console.debug(Debug.formatString(format, args));
    }

    // Helper function to format a string with arguments
    private static formatString(format: string, args: unknown[]): string {
        return format.replace(/{(\d+)}/g, (match: string, index: string) => {
            const arg = args[Number(index)];
            return typeof arg !== "undefined" ? String(arg) : match;
        });
    }
}
