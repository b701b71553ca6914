import { runSubtaskWrapper } from "../src/execution/tractor/subtaskWrapper.js";

// Entry point referenced by the farm config (`commands.subtask_wrapper`).
runSubtaskWrapper(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
