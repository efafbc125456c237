import {z} from 'zod';
import {accountNumberSchema, requiredString} from './CommandSchemas';
import {validateCommand} from './CommandValidation';

const DeleteAccountCommandSchema = z.object({
    accountNumber: accountNumberSchema(),
    name: requiredString('Name cannot be null or empty'),
    pin: requiredString('PIN cannot be null or empty'),
});

/**
 * 口座削除コマンド
 */
export class DeleteAccountCommand {
    constructor(
        public readonly accountNumber: string,
        public readonly name: string,
        public readonly pin: string
    ) {
        validateCommand(DeleteAccountCommandSchema, {accountNumber, name, pin});
    }
}
