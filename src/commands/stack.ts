import { InvalidArgumentError } from 'commander';
import { StackAction, StackService } from '../stack/stack.service';
import { GlobalOptions, withApplication } from './bootstrap';

export const STACK_ACTIONS: readonly StackAction[] = ['preview', 'up', 'destroy', 'outputs'];

export function parseStackAction(value: string): StackAction {
  const action = STACK_ACTIONS.find((candidate) => candidate === value);
  if (!action) {
    throw new InvalidArgumentError(`Expected one of: ${STACK_ACTIONS.join(', ')}`);
  }
  return action;
}

export function stackCommand(action: StackAction, options: GlobalOptions): Promise<void> {
  return withApplication(options, async (app) => {
    const stacks = app.get(StackService);
    switch (action) {
      case 'preview': {
        const result = await stacks.preview();
        console.log(JSON.stringify(result.changeSummary, null, 2));
        return;
      }
      case 'up': {
        const result = await stacks.up();
        console.log(JSON.stringify(result.summary.resourceChanges ?? {}, null, 2));
        return;
      }
      case 'destroy': {
        const result = await stacks.destroy();
        console.log(`Destroy ${result.summary.result}`);
        return;
      }
      case 'outputs': {
        const outputs = await stacks.outputs();
        for (const [name, output] of Object.entries(outputs)) {
          console.log(`${name}: ${output.secret ? '[secret]' : JSON.stringify(output.value)}`);
        }
        return;
      }
    }
  });
}
