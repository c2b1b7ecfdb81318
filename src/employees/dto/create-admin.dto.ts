import { CreateAccountDto } from './create-employee.dto';

export class CreateAdminDto extends CreateAccountDto {}
