export class LocationError extends Error {
  constructor(message: string, public query: string) {
    super(message);
    this.name = "LocationError";
  }
}
