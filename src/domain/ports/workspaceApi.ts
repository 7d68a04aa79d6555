export interface CustomEmojiDefinition {
    name: string;
    value: string; // image URL or "alias:<name>"
}

export interface WorkspaceInfo {
    id?: string;
    name?: string;
    domain?: string;
}

/**
 * One method per outbound call. Implementations translate platform failures
 * into ThrottledError, AuthError or TransientRequestError.
 */
export interface WorkspaceApi {
    listCustomEmoji(): Promise<CustomEmojiDefinition[]>;
    countMessages(query: string): Promise<number>;
    fetchWorkspaceInfo(): Promise<WorkspaceInfo>;
}
