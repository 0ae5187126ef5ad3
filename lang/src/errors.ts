export class SyntaxError extends Error
{
    constructor(message: string, public readonly startLine?: number, public readonly startCol?: number) {
        super(message);
        this.name = "SyntaxError";
    }
}
