/**
 * BloggerPost Entity
 *
 * Posts live on the remote blog; this module only describes their shape
 * and the rules used to match and rebuild them.
 */

/**
 * Lifecycle states, in the order they are searched.
 */
export const POST_STATUSES = ['DRAFT', 'SCHEDULED', 'LIVE'] as const;

export type PostStatus = (typeof POST_STATUSES)[number];

/**
 * A post as returned by the remote API.
 */
export interface BloggerPost {
    id: string;
    title?: string;
    content?: string;
    /** DRAFT, SCHEDULED or LIVE as the API spells it */
    status?: string;
    labels?: string[];
    url?: string;
    [field: string]: unknown;
}

/**
 * Body sent to insert and update calls.
 */
export interface PostBody {
    title: string;
    content: string;
    labels?: string[];
}

/**
 * Input to the publish orchestrator.
 */
export interface PublishRequest {
    title: string;
    rawContent: string;
    labels: string[];
    /** Directory used to resolve relative image references */
    sourceBasePath?: string;
    /** Source HTML file; its parent directory is used when no base path is set */
    sourceFilePath?: string;
    /** Only applies when a new post is created */
    isDraft: boolean;
}

/**
 * Trims and case-folds a title for comparison.
 */
export function normalizeTitle(value: string | null | undefined): string {
    return String(value ?? '').trim().toLowerCase();
}

export function titlesMatch(a: string | null | undefined, b: string | null | undefined): boolean {
    return normalizeTitle(a) === normalizeTitle(b);
}

export function isDraftStatus(status: string | null | undefined): boolean {
    return normalizeTitle(status) === 'draft';
}

/**
 * Builds the insert/update body. Labels are only included when present.
 */
export function buildPostBody(title: string, content: string, labels: string[] = []): PostBody {
    const body: PostBody = { title, content };
    if (labels.length > 0) {
        body.labels = [...labels];
    }
    return body;
}

/**
 * Parses a comma-separated label list.
 */
export function parseLabels(raw: string | undefined): string[] {
    if (!raw) {
        return [];
    }
    return raw
        .split(',')
        .map(label => label.trim())
        .filter(label => label.length > 0);
}

export function createPublishRequest(input: {
    title: string;
    rawContent: string;
    labels?: string[];
    sourceBasePath?: string;
    sourceFilePath?: string;
    isDraft?: boolean;
}): PublishRequest {
    if (!input.title.trim()) {
        throw new Error('Post title cannot be empty');
    }

    return {
        title: input.title,
        rawContent: input.rawContent,
        labels: input.labels ?? [],
        sourceBasePath: input.sourceBasePath,
        sourceFilePath: input.sourceFilePath,
        isDraft: input.isDraft ?? true,
    };
}
