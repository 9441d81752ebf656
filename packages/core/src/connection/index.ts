export { ConnectionHost, type SimpleConnectionOptions } from './connection-host';
export { SimpleConnection, SimpleConnectionMixin } from './simple-connection';
