import {z} from 'zod';
import {requiredString} from './CommandSchemas';
import {validateCommand} from './CommandValidation';

const CreateAccountCommandSchema = z.object({
    name: requiredString('Name cannot be null or empty'),
    pin: requiredString('PIN cannot be null or empty'),
});

/**
 * 口座開設コマンド
 *
 * PINの長さ（4文字以上）は入力値の検証ではなく業務ルールなので、
 * ここでは扱わない。短いPINは集約が null を返して拒否する。
 */
export class CreateAccountCommand {
    constructor(
        public readonly name: string,
        public readonly pin: string
    ) {
        validateCommand(CreateAccountCommandSchema, {name, pin});
    }
}
