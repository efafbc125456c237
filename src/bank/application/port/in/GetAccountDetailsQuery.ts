import {z} from 'zod';
import {accountNumberSchema, requiredString} from './CommandSchemas';
import {validateCommand} from './CommandValidation';

const GetAccountDetailsQuerySchema = z.object({
    accountNumber: accountNumberSchema(),
    pin: requiredString('PIN cannot be null or empty'),
});

/**
 * 口座照会クエリ
 */
export class GetAccountDetailsQuery {
    constructor(
        public readonly accountNumber: string,
        public readonly pin: string
    ) {
        validateCommand(GetAccountDetailsQuerySchema, {accountNumber, pin});
    }
}
