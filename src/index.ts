export * from './model.js';
export * from './errors.js';
export { createLogger, type Logger, type LogLevel, type LogSink } from './log.js';
export { readEnv, configReport, type EnvConfig } from './config.js';
export { serializeTasks, deserializeTasks, FORMAT_VERSION } from './codec/taskCodec.js';
export { readTaskFile, writeTaskFile, fsTaskFileIO, type TaskFileIO } from './store/taskFile.js';
export * from './controller/taskList.js';
export * from './picker/picker.js';
export { PromptFilePicker } from './picker/prompt.js';
export { ScriptedFilePicker } from './picker/scripted.js';
export * from './preferences.js';
export { Session, type FileActionResult } from './session.js';
export { renderState, renderTask } from './render.js';
export { Shell, runShell } from './shell.js';
export { LineReader } from './lineReader.js';
export * from './commands.js';
