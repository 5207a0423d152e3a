import type { HasRequestProperties } from './HasRequestProperties';
import type { PendingRequest } from './PendingRequest';

/**
 * A capability attached to a connector or request.
 *
 * Plugins are listed explicitly in `plugins()` and booted once per
 * PendingRequest, after the connector and request boot hooks: connector
 * plugins first, then request plugins, each in list order.
 */
export interface Plugin {
  readonly name: string;
  boot(pendingRequest: PendingRequest, owner: HasRequestProperties): void;
}

export function acceptsJson(): Plugin {
  return {
    name: 'acceptsJson',
    boot: (pendingRequest) => {
      pendingRequest.headers().add('Accept', 'application/json');
    },
  };
}

export function hasJsonBody(): Plugin {
  return {
    name: 'hasJsonBody',
    boot: (pendingRequest) => {
      pendingRequest.headers().add('Content-Type', 'application/json');
      pendingRequest.config().add('bodyFormat', 'json');
    },
  };
}

export function hasFormBody(): Plugin {
  return {
    name: 'hasFormBody',
    boot: (pendingRequest) => {
      pendingRequest.headers().add('Content-Type', 'application/x-www-form-urlencoded');
      pendingRequest.config().add('bodyFormat', 'form');
    },
  };
}

/**
 * Sets the per-request timeout read by TransportSender. A timeout already
 * present in the merged config wins.
 */
export function hasTimeout(timeoutMs: number): Plugin {
  return {
    name: 'hasTimeout',
    boot: (pendingRequest) => {
      if (!pendingRequest.config().has('timeout')) {
        pendingRequest.config().add('timeout', timeoutMs);
      }
    },
  };
}

/**
 * Turns every 4xx/5xx response into a thrown RequestException.
 */
export function alwaysThrowOnErrors(): Plugin {
  return {
    name: 'alwaysThrowOnErrors',
    boot: (pendingRequest) => {
      pendingRequest.middleware().onResponse((response) => {
        response.throw();
      });
    },
  };
}
