import { InvalidTokenError } from '../errors/IntakeErrors.js';

/**
 * Contributor tokens and the inbox folder each one uploads into
 */
export class ContributorRegistry {
    constructor(private readonly tokens: Map<string, string>) {}

    /**
     * @throws InvalidTokenError for an unknown token
     */
    folderFor(token: string | undefined): string {
        const folder = token === undefined ? undefined : this.tokens.get(token);
        if (folder === undefined) {
            throw new InvalidTokenError();
        }
        return folder;
    }

    /** Token of an inbox folder, null for folders nobody uploads into */
    tokenForFolder(folder: string): string | null {
        for (const [token, tokenFolder] of this.tokens) {
            if (tokenFolder === folder) {
                return token;
            }
        }
        return null;
    }

    folders(): string[] {
        return [...new Set(this.tokens.values())];
    }
}
