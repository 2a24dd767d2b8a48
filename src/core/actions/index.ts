export { Action, FileAction, type ActionContext, type Executable } from './action.js';
export { ActionBlock, type BlockExecuteOptions } from './action-block.js';
export { CompileAction, compileOptionsSchema } from './compile.js';
export { CopyAction, copyOptionsSchema } from './copy.js';
export { ImportContextAction, importContextOptionsSchema } from './import-context.js';
export { RunAction, runOptionsSchema } from './run.js';
export { SetupAction } from './setup.js';
export { StowAction, stowOptionsSchema } from './stow.js';
export { SymlinkAction, symlinkOptionsSchema } from './symlink.js';
export { TriggerAction, triggerOptionsSchema, type Trigger } from './trigger.js';
