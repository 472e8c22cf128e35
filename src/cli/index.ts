// src/cli/index.ts

import figlet from 'figlet';
import gradient from 'gradient-string';
import { createProgram } from './program.ts';

console.log(gradient.rainbow.multiline(
    figlet.textSync('pngchunk', {
        font: 'Standard',
        horizontalLayout: 'default',
        verticalLayout: 'default',
        width: 80,
        whitespaceBreak: true,
    }),
));

await createProgram().parseAsync(process.argv);
