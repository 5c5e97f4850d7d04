import { BuiltRequest } from '../models/Request';
import { RequestExecutor } from '../http/HttpClient';
import { HttpResponse } from '../http/HttpResponse';
import { ResponseDisplay } from '../http/ResponseDisplay';
import { ResponseWriter } from '../storage/ResponseWriter';
import { getLogger } from '../logger';

export interface RunOptions {
    verbose?: boolean;
    display?: ResponseDisplay;
    /** Omit to leave response bodies unsaved */
    writer?: ResponseWriter;
}

export interface RunResult<TClient> {
    request: BuiltRequest<TClient>;
    response: HttpResponse;
    savedTo?: string;
}

/**
 * Send the requests one after another, in file order, through the client
 * each one is bound to. The first failure stops the run and is rethrown;
 * requests after it are not sent.
 */
export async function runRequests<TClient extends RequestExecutor>(
    requests: readonly BuiltRequest<TClient>[],
    options: RunOptions = {}
): Promise<RunResult<TClient>[]> {
    const logger = getLogger();
    const display = options.display ?? new ResponseDisplay();
    const results: RunResult<TClient>[] = [];

    for (const [index, request] of requests.entries()) {
        if (options.verbose) {
            display.showRequest(request);
        }

        logger.debug('Sending request', {
            index: index + 1,
            of: requests.length,
            method: request.method,
            url: request.url,
        });

        let response: HttpResponse;
        try {
            response = await request.client.execute(request);
        } catch (error) {
            logger.error('Request failed', {
                index: index + 1,
                method: request.method,
                url: request.url,
                skipped: requests.length - index - 1,
            });
            throw error;
        }

        display.showResponse(response, options.verbose ?? false);
        const savedTo = options.writer?.save(response);
        results.push({ request, response, savedTo });
    }

    return results;
}
