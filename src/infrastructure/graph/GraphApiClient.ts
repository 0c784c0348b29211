import axios, { AxiosRequestConfig } from 'axios';
import FormData from 'form-data';
import fs from 'fs';
import path from 'path';
import {
    ContainerParams,
    ContainerStatusBody,
    GraphResponse,
    IdBody,
    IGraphApiClient,
    InstagramAccountBody,
    PageTokenBody,
} from '../../domain/ports/IGraphApiClient';

/**
 * Thin axios wrapper over the Facebook Graph API.
 * Every HTTP status is returned to the caller; only transport failures throw.
 */
export class GraphApiClient implements IGraphApiClient {
    private readonly requestConfig: AxiosRequestConfig = {
        validateStatus: () => true,
        timeout: 120000,
    };

    constructor(private readonly baseUrl: string = 'https://graph.facebook.com/v18.0') { }

    async getPageAccessToken(pageId: string, userToken: string): Promise<GraphResponse<PageTokenBody>> {
        const response = await axios.get<PageTokenBody>(`${this.baseUrl}/${pageId}`, {
            ...this.requestConfig,
            params: { fields: 'access_token', access_token: userToken },
        });
        return { status: response.status, data: response.data };
    }

    async getInstagramAccountId(pageId: string, accessToken: string): Promise<GraphResponse<InstagramAccountBody>> {
        const response = await axios.get<InstagramAccountBody>(`${this.baseUrl}/${pageId}`, {
            ...this.requestConfig,
            params: { fields: 'instagram_business_account', access_token: accessToken },
        });
        return { status: response.status, data: response.data };
    }

    async uploadPageVideo(
        pageId: string,
        pageToken: string,
        filePath: string,
        description: string
    ): Promise<GraphResponse<IdBody>> {
        const stream = fs.createReadStream(filePath);
        try {
            const form = new FormData();
            form.append('source', stream, { filename: path.basename(filePath), contentType: 'video/mp4' });
            form.append('description', description);
            form.append('access_token', pageToken);
            form.append('published', 'true');

            const response = await axios.post<IdBody>(`${this.baseUrl}/${pageId}/videos`, form, {
                ...this.requestConfig,
                headers: form.getHeaders(),
                maxBodyLength: Infinity,
                maxContentLength: Infinity,
                timeout: 600000,
            });
            return { status: response.status, data: response.data };
        } finally {
            stream.destroy();
        }
    }

    async createMediaContainer(
        accountId: string,
        accessToken: string,
        params: ContainerParams
    ): Promise<GraphResponse<IdBody>> {
        const body = new URLSearchParams({ ...params, access_token: accessToken });
        const response = await axios.post<IdBody>(`${this.baseUrl}/${accountId}/media`, body, this.requestConfig);
        return { status: response.status, data: response.data };
    }

    async getContainerStatus(creationId: string, accessToken: string): Promise<GraphResponse<ContainerStatusBody>> {
        const response = await axios.get<ContainerStatusBody>(`${this.baseUrl}/${creationId}`, {
            ...this.requestConfig,
            params: { fields: 'status_code,status', access_token: accessToken },
        });
        return { status: response.status, data: response.data };
    }

    async publishMediaContainer(
        accountId: string,
        accessToken: string,
        creationId: string
    ): Promise<GraphResponse<IdBody>> {
        const body = new URLSearchParams({ creation_id: creationId, access_token: accessToken });
        const response = await axios.post<IdBody>(`${this.baseUrl}/${accountId}/media_publish`, body, this.requestConfig);
        return { status: response.status, data: response.data };
    }
}

