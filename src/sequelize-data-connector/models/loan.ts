import { DataTypes, Sequelize } from "sequelize";
import { LoanStatus } from "../../base-data-connector";

// usuarioId/libroId are plain columns: loan history outlives deleted books
export const defineLoan = (sequelize: Sequelize) => sequelize.define('loan', {
    usuarioId: { type: DataTypes.INTEGER, allowNull: false },
    libroId: { type: DataTypes.INTEGER, allowNull: false },
    fechaPrestamo: { type: DataTypes.DATE, allowNull: false },
    fechaDevolucionEsperada: { type: DataTypes.DATE, allowNull: false },
    fechaDevolucionReal: { type: DataTypes.DATE, allowNull: true },
    diasRetraso: { type: DataTypes.INTEGER, allowNull: false },
    multaGenerada: { type: DataTypes.STRING, allowNull: false },
    estado: { type: DataTypes.ENUM, values: Object.values(LoanStatus), allowNull: false },
    renovaciones: { type: DataTypes.INTEGER, allowNull: false },
}, { timestamps: false });
