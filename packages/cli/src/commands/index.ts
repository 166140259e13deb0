export { registerHelpCommand, readHelpText } from './help';
export { registerGenerateCommand } from './generate';
export { registerCopyCommand } from './copy';
export { registerCleanCommand } from './clean';
export { registerZeroCommand } from './zero';
export { registerCompileCommand, registerRunCommand } from './build';
export { registerDoctorCommand, runDoctorChecks } from './doctor';
