export type Cleaner = () => void | Promise<void>;

export class ListenerCleaner {
    private cleaners: Cleaner[] = [];

    add(cleanerCallback: Cleaner): void {
        this.cleaners.push(cleanerCallback);
    }

    /**
     * Run the cleaners in reverse registration order and reset this cleaner to be reused.
     * Every cleaner runs even if an earlier one throws; the first error is rethrown at the end.
     */
    async cleanUp(): Promise<void> {
        const cleaners = this.cleaners.reverse();
        this.cleaners = [];
        let firstError: unknown = null;
        for (const cleaner of cleaners) {
            try {
                await cleaner();
            } catch (error) {
                firstError = firstError ?? error;
            }
        }
        if (firstError !== null) {
            throw firstError;
        }
    }
}
