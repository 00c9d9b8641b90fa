/**
 * Service Client Base
 *
 * Request plumbing shared by the Keystone and Heat clients: reads are retried
 * on transport failures, mutations are issued exactly once.
 */

import type { OpenStackRetryOptions } from "./types.js";
import { toSubmissionError } from "./errors.js";
import { joinUrl, openstackRequest } from "./api.js";
import { withOpenStackRetry } from "./retry.js";
import { instrumentedOpenStackCall } from "./diagnostics.js";

export type OpenStackClientOptions = {
  /** Service base URL, e.g. "http://keystone:35357/v2.0". */
  baseUrl: string;
  getToken: () => Promise<string>;
  retry?: OpenStackRetryOptions;
  region?: string;
  signal?: AbortSignal;
};

export abstract class OpenStackServiceClient {
  protected options: OpenStackClientOptions;
  /** Catalog service type, used to label diagnostics. */
  protected abstract readonly service: string;

  constructor(options: OpenStackClientOptions) {
    this.options = options;
  }

  /** Idempotent GET, retried on transport failures. */
  protected async read(path: string, operation: string): Promise<unknown> {
    return instrumentedOpenStackCall(
      this.service,
      operation,
      () =>
        withOpenStackRetry(async () => {
          const token = await this.options.getToken();
          return openstackRequest(joinUrl(this.options.baseUrl, path), token, { signal: this.options.signal });
        }, this.options.retry),
      { region: this.options.region },
    );
  }

  /** Mutating call, issued once; rejections surface as `SubmissionError`. */
  protected async mutate(path: string, operation: string, method: string, body?: unknown): Promise<unknown> {
    return instrumentedOpenStackCall(
      this.service,
      operation,
      async () => {
        const token = await this.options.getToken();
        try {
          return await openstackRequest(joinUrl(this.options.baseUrl, path), token, {
            method,
            body,
            signal: this.options.signal,
          });
        } catch (err) {
          throw toSubmissionError(err);
        }
      },
      { region: this.options.region },
    );
  }
}
