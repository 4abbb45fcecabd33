function readString(record: object, key: string): string | undefined {
    const value: unknown = Reflect.get(record, key);
    return typeof value === 'string' ? value : undefined;
}

/**
 * Extracts a readable message from a Google error body.
 * Handles `{ error: { message } }`, `{ error, error_description }` and plain text.
 */
export function describeErrorBody(data: unknown): string {
    if (data && typeof data === 'object') {
        const error: unknown = Reflect.get(data, 'error');
        if (error && typeof error === 'object') {
            const message = readString(error, 'message');
            if (message) return message;
        }
        if (typeof error === 'string') {
            const description = readString(data, 'error_description');
            return description ? `${error}: ${description}` : error;
        }
    }
    if (typeof data === 'string' && data.trim()) {
        return data.trim();
    }
    return 'no details';
}
