export class ScriptFormatError extends Error {
  constructor(
    message: string,
    public path: string = "",
  ) {
    super(path ? `${message} at '${path}'` : message);
    this.name = "ScriptFormatError";
  }
}
