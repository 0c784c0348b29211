/**
 * HTTP status and decoded body of a Graph API call.
 */
export interface GraphResponse<T> {
    status: number;
    data: T;
}

export interface GraphErrorBody {
    error?: { message?: string; type?: string; code?: number };
}

export interface IdBody extends GraphErrorBody {
    id?: string;
}

export interface PageTokenBody extends GraphErrorBody {
    access_token?: string;
}

export interface InstagramAccountBody extends IdBody {
    instagram_business_account?: { id?: string };
}

export interface ContainerStatusBody extends GraphErrorBody {
    status_code?: string;
    status?: string;
}

export type ContainerParams = Record<string, string>;

/**
 * IGraphApiClient - Port for the social platform's Graph API.
 * Returns every HTTP answer; throws only when no answer was received.
 */
export interface IGraphApiClient {
    getPageAccessToken(pageId: string, userToken: string): Promise<GraphResponse<PageTokenBody>>;
    getInstagramAccountId(pageId: string, accessToken: string): Promise<GraphResponse<InstagramAccountBody>>;
    uploadPageVideo(
        pageId: string,
        pageToken: string,
        filePath: string,
        description: string
    ): Promise<GraphResponse<IdBody>>;
    createMediaContainer(
        accountId: string,
        accessToken: string,
        params: ContainerParams
    ): Promise<GraphResponse<IdBody>>;
    getContainerStatus(creationId: string, accessToken: string): Promise<GraphResponse<ContainerStatusBody>>;
    publishMediaContainer(
        accountId: string,
        accessToken: string,
        creationId: string
    ): Promise<GraphResponse<IdBody>>;
}

/**
 * Error text the Graph API put in a response body, if any.
 */
export function graphErrorMessage(response: GraphResponse<GraphErrorBody>): string {
    return response.data?.error?.message ?? `HTTP ${response.status}`;
}
