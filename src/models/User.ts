import { Schema, model } from 'mongoose';

export interface IUser {
  username: string;
  passwordHash: string;
  roles: string[];
  createdAt?: Date;
  updatedAt?: Date;
}

const userSchema = new Schema<IUser>({
  username: {
    type: String,
    required: true,
    unique: true,
    trim: true,
    index: true,
    validate: {
      validator: (v: string) => /^[A-Za-z0-9_.@-]{1,64}$/.test(v),
      message: props => `${props.value} is not a valid username!`,
    },
  },
  passwordHash: {
    type: String,
    required: true,
  },
  roles: {
    type: [String],
    default: [],
  },
}, {
  timestamps: true,
});

const User = model<IUser>('User', userSchema);

export default User;
