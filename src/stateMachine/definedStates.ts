// src/stateMachine/definedStates.ts

export enum InspectorStates {
    INIT = 'INIT',
    READ_FILE = 'READ_FILE',
    PARSE_PNG = 'PARSE_PNG',
    DESCRIBE_CHUNKS = 'DESCRIBE_CHUNKS',
    COMPLETED = 'COMPLETED',
    ERROR = 'ERROR',
}
