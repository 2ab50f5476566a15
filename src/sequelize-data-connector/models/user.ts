import { DataTypes, Sequelize } from "sequelize";
import { Role } from "../../base-data-connector";

export const defineUser = (sequelize: Sequelize) => sequelize.define('user', {
    nombre: { type: DataTypes.STRING(100), allowNull: false },
    apellido: { type: DataTypes.STRING(100), allowNull: false },
    correo: { type: DataTypes.STRING, allowNull: false, unique: true },
    passwordHash: { type: DataTypes.STRING(128), allowNull: false },
    edad: { type: DataTypes.INTEGER, allowNull: false },
    numeroIdentidad: { type: DataTypes.STRING(50), allowNull: false, unique: true },
    telefono: { type: DataTypes.STRING(20), allowNull: false },
    rol: { type: DataTypes.ENUM, values: Object.values(Role), allowNull: false },
    activo: { type: DataTypes.BOOLEAN, allowNull: false },
    fechaRegistro: { type: DataTypes.DATE, allowNull: false },
    multas: { type: DataTypes.STRING, allowNull: false },
}, { timestamps: false });
