// src/stateMachine/definedStates.ts

export enum ConverterStates {
    INIT = 'INIT',
    LOAD_SOURCE = 'LOAD_SOURCE',
    RESIZE_VARIANTS = 'RESIZE_VARIANTS',
    ASSEMBLE_CONTAINER = 'ASSEMBLE_CONTAINER',
    WRITE_OUTPUT = 'WRITE_OUTPUT',
    COMPLETED = 'COMPLETED',
    ERROR = 'ERROR',
}
