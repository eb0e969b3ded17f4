/**
 * Request parameters from SimXhr.send(). Each send() mints a new instance, which is the handle the
 * transport passes back with every callback for that cycle.
 */
export default class TransferCycle {
  private readonly _id: number;
  private readonly _method: string;
  private readonly _url: string;
  private readonly _body: unknown;
  private readonly _async: boolean;
  private readonly _timeout: number;

  constructor(
    id: number,
    method: string,
    url: string,
    body: unknown = null,
    async = true,
    timeout = 0
  ) {
    this._id = id;
    this._method = method;
    this._url = url;
    this._body = body;
    this._async = async;
    this._timeout = timeout;
  }

  /**
   * @returns Sequence number of this cycle on its request
   */
  get id() { return this._id; }

  get method() { return this._method; }

  get url() { return this._url; }

  get body() { return this._body; }

  get async() { return this._async; }

  /**
   * @returns Deadline in milliseconds, 0 for none. Always 0 for synchronous transfers.
   */
  get timeout() { return this._timeout; }
}
