export { ServiceError } from './ServiceError'
export { TransportError, classifyTransportError, toTransportError, type TransportErrorKind } from './TransportError'
export {
    CorrelationError,
    TenantRuntimeError,
    SecretConfigError,
    DecryptionError,
    type TenantRuntimeErrorCode,
    type SecretConfigErrorCode,
} from './domainErrors'
