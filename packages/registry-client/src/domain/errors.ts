export class RegistryRequestError extends Error {
  readonly url: string;
  readonly status: number;

  constructor(message: string, url: string, status: number) {
    super(message);
    this.name = "RegistryRequestError";
    this.url = url;
    this.status = status;
  }
}
