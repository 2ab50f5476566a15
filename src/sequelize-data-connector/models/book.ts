import { DataTypes, Sequelize } from "sequelize";
import { BookStatus } from "../../base-data-connector";

export const defineBook = (sequelize: Sequelize) => sequelize.define('book', {
    titulo: { type: DataTypes.STRING(200), allowNull: false },
    autor: { type: DataTypes.STRING(100), allowNull: false },
    isbn: { type: DataTypes.STRING(20), allowNull: false, unique: true },
    categoria: { type: DataTypes.STRING(100), allowNull: false },
    editorial: { type: DataTypes.STRING(100), allowNull: false },
    anioPublicacion: { type: DataTypes.INTEGER, allowNull: false },
    copiasTotal: { type: DataTypes.INTEGER, allowNull: false },
    copiasDisponibles: { type: DataTypes.INTEGER, allowNull: false },
    ubicacion: { type: DataTypes.STRING(100), allowNull: false },
    estado: { type: DataTypes.ENUM, values: Object.values(BookStatus), allowNull: false },
    descripcion: { type: DataTypes.TEXT, allowNull: false },
    fechaIngreso: { type: DataTypes.DATE, allowNull: false },
}, { timestamps: false });
