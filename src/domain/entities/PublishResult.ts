export type Platform = 'facebook' | 'instagram';

/**
 * Why a publish attempt failed.
 * - configuration: a page id, token or account id is missing or unusable
 * - staging: the object store upload failed
 * - api: a Graph API call failed or answered without an id
 * - processing_error: Instagram reported status ERROR for the container
 * - timed_out: the container never reached FINISHED within the poll budget
 */
export type PublishFailureKind = 'configuration' | 'staging' | 'api' | 'processing_error' | 'timed_out';

export interface PublishSuccess {
    platform: Platform;
    success: true;
    postId: string;
}

export interface PublishFailure {
    platform: Platform;
    success: false;
    failure: PublishFailureKind;
    message: string;
}

export type PublishResult = PublishSuccess | PublishFailure;

export function published(platform: Platform, postId: string): PublishSuccess {
    return { platform, success: true, postId };
}

export function publishFailed(platform: Platform, failure: PublishFailureKind, message: string): PublishFailure {
    return { platform, success: false, failure, message };
}
