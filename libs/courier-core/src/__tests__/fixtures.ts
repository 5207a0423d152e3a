import { Connector } from '../Connector';
import { Request } from '../Request';
import { Response } from '../Response';
import type { BodyData, HttpHeaders, HttpMethod, QueryParams } from '../types';

export class TestConnector extends Connector {
  resolveBaseUrl(): string {
    return 'https://api.example.com/v1/';
  }

  protected defaultHeaders(): HttpHeaders {
    return { Accept: 'application/json', 'X-Client': 'connector' };
  }

  protected defaultQuery(): QueryParams {
    return { locale: 'en' };
  }
}

export class OtherConnector extends Connector {
  resolveBaseUrl(): string {
    return 'https://other.example.com';
  }
}

export class GetUserRequest extends Request {
  readonly method: HttpMethod = 'GET';

  constructor(private readonly userId = 1) {
    super();
  }

  resolveEndpoint(): string {
    return `/users/${this.userId}`;
  }

  protected defaultHeaders(): HttpHeaders {
    return { 'X-Client': 'request' };
  }
}

export class CreateUserRequest extends Request {
  readonly method: HttpMethod = 'POST';

  resolveEndpoint(): string {
    return 'users';
  }

  protected defaultBody(): BodyData {
    return { name: 'Ada', role: 'admin' };
  }
}

export class UserResponse extends Response {
  userName(): string {
    const name = this.object().name;
    return typeof name === 'string' ? name : '';
  }
}
