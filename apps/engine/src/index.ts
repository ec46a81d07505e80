export * from './plays/types';
export * from './plays/field-parsers';
export { cleanPlays, isRunOrPass, loadPlays, parsePlaysCsv } from './plays/play-loader';
export { derivePlay, derivePlays, qbAlignment } from './plays/indicators';
export * from './filters/situational-filter';
export * from './filters/filter-options';
export * from './filters/week-order';
export * from './tendencies/offense';
export * from './tendencies/defense';
export * from './rankings/league-rankings';
export * from './rankings/format';
export * from './config/engine-config';
export * from './dataset';
export * from './tendency-views';
