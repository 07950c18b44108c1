export interface ClientStart {
  type: 'client_start';
  clientId: number;
}

export interface ReadRequest {
  type: 'read_request';
  clientId: number;
  replyTo: 'read_response';
}

export interface WriteRequest {
  type: 'write_request';
  clientId: number;
  expectedVersion: number;
  replyTo: 'write_response';
}

export interface ReadResponse {
  type: 'read_response';
  clientId: number;
  version: number;
}

export interface WriteResponse {
  type: 'write_response';
  clientId: number;
  success: boolean;
}

export type ServerRequest = ReadRequest | WriteRequest;

export type SimMessage = ClientStart | ServerRequest | ReadResponse | WriteResponse;

export interface Delivery {
  deliverAt: number;
  message: SimMessage;
}

export interface ScheduledDelivery extends Delivery {
  /** Insertion order; breaks ties between equal delivery times. */
  seq: number;
}
