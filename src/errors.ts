import { Data } from "effect";

export class TransportBindError extends Data.TaggedError("TransportBindError")<{
  readonly host: string;
  readonly port: number;
  readonly reason: string;
}> {}

export class IpcBindError extends Data.TaggedError("IpcBindError")<{
  readonly reason: string;
}> {}

export class RpcBindError extends Data.TaggedError("RpcBindError")<{
  readonly portStart: number;
  readonly portEnd: number;
}> {}

export class InvalidCommandError extends Data.TaggedError("InvalidCommandError")<{
  readonly cmd: string;
  readonly reason: string;
}> {}

export class PayloadEncodeError extends Data.TaggedError("PayloadEncodeError")<{
  readonly reason: string;
}> {}

export class ClientSendError extends Data.TaggedError("ClientSendError")<{
  readonly id: number;
  readonly reason: string;
}> {}

export class UnknownClientError extends Data.TaggedError("UnknownClientError")<{
  readonly id: number;
}> {}

export class IpcProtocolError extends Data.TaggedError("IpcProtocolError")<{
  readonly reason: string;
}> {}

export class ProcessListError extends Data.TaggedError("ProcessListError")<{
  readonly reason: string;
}> {}

export class DetectablesLoadError extends Data.TaggedError("DetectablesLoadError")<{
  readonly path: string;
  readonly reason: string;
}> {}

export const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);
